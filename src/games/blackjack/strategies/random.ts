import { pick } from '../../../util/rng.js';
import type { Strategy } from './types.js';

export const random: Strategy = {
  name: 'random',
  description: 'Uniform choice among the legal actions, drawn from the session generator.',
  decide: ({ legal, rng }) => pick(legal, rng),
};
