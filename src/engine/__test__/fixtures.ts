import type { Card, GameState, Rank, Suit } from '../../types';
import { build_deck, remove_card } from '../helpers/card.util';
import { kennel_start } from '../helpers/board.util';
import { is_engine_error } from '../errors';

export const card = (suit: Suit, rank: Rank): Card => ({ suit, rank });

/**
 * 测试用基础局面：第 1 轮、席位 0 行动、手牌为空、整副牌都在牌堆、全部弹珠在狗窝。
 * 满足全部不变量。
 */
export function base_state(): GameState {
  return {
    phase: 'RUNNING',
    round: 1,
    started_player_idx: 0,
    active_player_idx: 0,
    players: [0, 1, 2, 3].map((i) => ({
      name: `P${i}`,
      hand: [],
      marbles: [0, 1, 2, 3].map((j) => ({ pos: kennel_start(i) + j, is_save: false })),
    })),
    draw_pile: build_deck(),
    discard_pile: [],
    active_card: null,
    card_exchanged: false,
    card_exchange_enabled: false,
    exchange_buffer: [null, null, null, null],
    steps_remaining: null,
    seven_snapshot: null,
    winning_team: null,
    rng_state: 1,
  };
}

/** 从牌堆里取出指定的牌交给玩家（保持总数守恒） */
export function give(state: GameState, player_idx: number, cards: Card[]): void {
  for (const c of cards) {
    if (!remove_card(state.draw_pile, c)) throw new Error(`card not in draw pile: ${c.suit}${c.rank}`);
    state.players[player_idx].hand.push({ ...c });
  }
}

export function place(state: GameState, player_idx: number, marble_idx: number, pos: number, is_save = false): void {
  state.players[player_idx].marbles[marble_idx] = { pos, is_save };
}

/** 执行并返回抛出的错误码；没抛错时返回 null */
export function error_code(fn: () => unknown): string | null {
  try {
    fn();
  } catch (e) {
    if (is_engine_error(e)) return e.code;
    throw e;
  }
  return null;
}
