import type { HouseRules } from '../../config/index.js';
import type { Logger } from '../../log.js';
import type { RNG } from '../../util/rng.js';
import { ShoeEmptyError } from '../../utils/errors.js';
import type { HiLoCounter } from './counting.js';
import { handTotal, isBlackjack, isBust, newHand } from './hand.js';
import type { Shoe } from './shoe.js';
import { legalActions, resolveAction } from './strategies/index.js';
import type { Strategy } from './strategies/index.js';
import type { HandOutcome, HandState, Rank, SettledHand } from './types.js';

/** Everything a round borrows from its session. */
export interface Table {
  shoe: Shoe;
  counter: HiLoCounter;
  rules: HouseRules;
  strategy: Strategy;
  rng: RNG;
  log?: Logger;
}

export interface BJState {
  playerHands: HandState[];
  dealer: Rank[];
  activeIndex: number; // which player hand is active
  wager: number;
  natural: boolean;
  dealerPlayed: boolean;
  finished: boolean;
  reshuffles: number;
}

/**
 * Next card for the round. An empty shoe is reshuffled on the spot (the
 * count starts over) and the deal continues.
 */
export function drawCard(table: Table, state: BJState): Rank {
  try {
    return table.shoe.draw();
  } catch (err) {
    if (!(err instanceof ShoeEmptyError)) throw err;
    table.shoe.reshuffle();
    state.reshuffles++;
    table.log?.info({ msg: 'mid_round_reshuffle', code: err.code, decks: table.shoe.decks });
    return table.shoe.draw();
  }
}

export function dealInitial(table: Table, wager: number): BJState {
  const state: BJState = {
    playerHands: [],
    dealer: [],
    activeIndex: 0,
    wager,
    natural: false,
    dealerPlayed: false,
    finished: false,
    reshuffles: 0,
  };
  const first = drawCard(table, state);
  const second = drawCard(table, state);
  state.playerHands.push(newHand([first, second], wager));
  state.dealer.push(drawCard(table, state), drawCard(table, state));
  // Immediate blackjack resolution
  if (isBlackjack(state.playerHands[0]) || isBlackjack({ cards: state.dealer, splitDerived: false })) {
    state.natural = true;
    state.playerHands[0].done = true;
    state.finished = true;
  }
  return state;
}

function activeHand(state: BJState): HandState | undefined {
  return state.finished ? undefined : state.playerHands[state.activeIndex];
}

function advance(state: BJState): void {
  const hand = state.playerHands[state.activeIndex];
  hand.done = true;
  state.activeIndex++;
}

export function hit(table: Table, state: BJState): void {
  const hand = activeHand(state);
  if (!hand) return;
  hand.actions.push('hit');
  hand.cards.push(drawCard(table, state));
  if (isBust(hand.cards)) advance(state);
}

export function stand(state: BJState): void {
  const hand = activeHand(state);
  if (!hand) return;
  hand.actions.push('stand');
  advance(state);
}

export function doubleDown(table: Table, state: BJState): void {
  const hand = activeHand(state);
  if (!hand) return;
  hand.actions.push('double');
  hand.doubled = true;
  hand.wager *= 2;
  hand.cards.push(drawCard(table, state));
  advance(state);
}

export function split(table: Table, state: BJState): void {
  const hand = activeHand(state);
  if (!hand) return;
  const [c1, c2] = hand.cards;
  // split into two hands, draw one card each; both carry the split in their actions
  const h1 = newHand([c1, drawCard(table, state)], hand.wager, true);
  const h2 = newHand([c2, drawCard(table, state)], hand.wager, true);
  h1.actions.push(...hand.actions, 'split');
  h2.actions.push(...hand.actions, 'split');
  state.playerHands.splice(state.activeIndex, 1, h1, h2);
}

/** Runs the strategy over every player hand, splits included, until all are done. */
export function playPlayerHands(table: Table, state: BJState): void {
  while (!state.finished && state.activeIndex < state.playerHands.length) {
    const hand = state.playerHands[state.activeIndex];
    const { total, soft } = handTotal(hand.cards);
    if (total >= 21) {
      // 21 stands by itself, over 21 is already settled as a bust
      advance(state);
      continue;
    }
    const action = resolveAction(
      table.strategy,
      {
        hand,
        dealerUpCard: state.dealer[0],
        total,
        soft,
        legal: legalActions(hand, state.playerHands.length, table.rules),
        runningCount: table.counter.runningCount,
        trueCount: table.counter.trueCount(table.shoe.decksRemaining()),
        rng: table.rng,
      },
      table.log,
    );
    switch (action) {
      case 'hit':
        hit(table, state);
        break;
      case 'stand':
        stand(state);
        break;
      case 'double':
        doubleDown(table, state);
        break;
      case 'split':
        split(table, state);
        break;
    }
  }
}

export function dealerShouldHit(cards: readonly Rank[], rules: Pick<HouseRules, 'dealerHitsSoft17'>): boolean {
  const { total, soft } = handTotal(cards);
  if (total < 17) return true;
  return total === 17 && soft && rules.dealerHitsSoft17;
}

export function dealerPlay(table: Table, state: BJState): void {
  if (state.natural) return;
  // nothing left to beat when every hand busted
  if (state.playerHands.every((h) => isBust(h.cards))) return;
  state.dealerPlayed = true;
  while (dealerShouldHit(state.dealer, table.rules)) {
    state.dealer.push(drawCard(table, state));
  }
}

function settleNatural(state: BJState, rules: Pick<HouseRules, 'blackjackPayout'>): SettledHand[] {
  const hand = state.playerHands[0];
  const pbj = isBlackjack(hand);
  const dbj = isBlackjack({ cards: state.dealer, splitDerived: false });
  if (pbj && !dbj) {
    // blackjack pays 3:2 unless the rules say otherwise
    return [{ hand, outcome: 'blackjack', profit: hand.wager * rules.blackjackPayout }];
  }
  if (pbj && dbj) return [{ hand, outcome: 'push', profit: 0 }];
  return [{ hand, outcome: 'lose', profit: -hand.wager }];
}

export function settle(state: BJState, rules: Pick<HouseRules, 'blackjackPayout'>): SettledHand[] {
  if (state.natural) return settleNatural(state, rules);
  const dealerTotal = handTotal(state.dealer).total;
  return state.playerHands.map((hand) => {
    const total = handTotal(hand.cards).total;
    let outcome: HandOutcome;
    if (isBust(hand.cards)) outcome = 'bust';
    else if (dealerTotal > 21 || total > dealerTotal) outcome = 'win';
    else if (total === dealerTotal) outcome = 'push';
    else outcome = 'lose';
    const profit = outcome === 'win' ? hand.wager : outcome === 'push' ? 0 : -hand.wager;
    return { hand, outcome, profit };
  });
}

/** One full round: deal, player decisions, dealer, settlement. */
export function playRound(table: Table, wager: number): { state: BJState; settled: SettledHand[] } {
  const state = dealInitial(table, wager);
  playPlayerHands(table, state);
  dealerPlay(table, state);
  state.finished = true;
  return { state, settled: settle(state, table.rules) };
}

export function resultOf(outcome: HandOutcome): 'win' | 'lose' | 'push' {
  if (outcome === 'blackjack') return 'win';
  if (outcome === 'bust') return 'lose';
  return outcome;
}
