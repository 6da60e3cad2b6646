import type { Strategy } from './types.js';

// Dealer-mimic: draw to 17, soft or hard, never double or split.
export const simplest: Strategy = {
  name: 'simplest',
  description: 'Hit below 17, stand on 17 or more; never doubles or splits.',
  decide: ({ total }) => (total < 17 ? 'hit' : 'stand'),
};
