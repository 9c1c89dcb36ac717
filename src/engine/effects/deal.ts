import type { GameState, ReduceContext } from '../../types';
import { DogEngineError } from '../errors';
import { PLAYER_COUNT } from '../helpers/board.util';
import { shuffle_cards } from './shuffle';

/** 每轮发牌数：6,5,4,3,2 循环 */
export function cards_for_round(round: number): number {
  return 7 - (((round - 1) % 5) + 1);
}

/**
 * 保证牌堆够发 count × 4 张：不够时把弃牌堆并入并重新洗牌；
 * 合并后仍不够 → DECK_EXHAUSTED（总数守恒时不会发生）。
 */
function replenish_draw_pile(state: GameState, count: number): void {
  const need = count * PLAYER_COUNT;
  if (state.draw_pile.length >= need) return;

  if (state.discard_pile.length > 0) {
    state.draw_pile = shuffle_cards(state, [...state.draw_pile, ...state.discard_pile]);
    state.discard_pile = [];
  }
  if (state.draw_pile.length < need) {
    throw new DogEngineError('DECK_EXHAUSTED', `need ${need} cards, have ${state.draw_pile.length}`, {
      round: state.round,
      draw: state.draw_pile.length,
    });
  }
}

/**
 * 发牌：先把各家剩余手牌收进弃牌堆，再从牌堆顶（数组尾部）给每人发 count 张。
 */
export function deal_cards(state: GameState, count: number): void {
  for (const player of state.players) {
    state.discard_pile.push(...player.hand);
    player.hand = [];
  }
  replenish_draw_pile(state, count);
  for (const player of state.players) {
    // 前面已保证足够
    player.hand = state.draw_pile.splice(state.draw_pile.length - count, count).reverse();
  }
}

/**
 * 一轮结束：轮次 +1，起始席位顺移一位并成为当前席位，重置换牌标记，按新轮次发牌。
 */
export function start_next_round(state: GameState, ctx?: ReduceContext): void {
  state.round += 1;
  state.started_player_idx = (state.started_player_idx + 1) % PLAYER_COUNT;
  state.active_player_idx = state.started_player_idx;
  state.card_exchanged = false;

  const count = cards_for_round(state.round);
  deal_cards(state, count);
  ctx?.logger?.info(`Round ${state.round} started with ${count} cards per player.`);
}
