import type { Card, GameState, ReduceContext } from '../../types';
import { PLAYER_COUNT } from '../helpers/board.util';
import { card_to_string, remove_card } from '../helpers/card.util';
import { start_next_round } from './deal';

/**
 * 出完一张牌：从手牌移入弃牌堆。虚拟牌（大王替代出的牌）不在手里，什么也不做。
 */
export function discard_played(state: GameState, card: Card, virtual: boolean): void {
  if (virtual) return;
  const hand = state.players[state.active_player_idx].hand;
  if (remove_card(hand, card)) state.discard_pile.push({ ...card });
}

/**
 * 轮到下一席位：清除 active_card；绕回本轮起始席位时进入下一轮并发牌。
 */
export function advance_turn(state: GameState, ctx?: ReduceContext): void {
  state.active_card = null;
  state.active_player_idx = (state.active_player_idx + 1) % PLAYER_COUNT;
  if (state.active_player_idx === state.started_player_idx) {
    start_next_round(state, ctx);
  }
}

/** 弃牌：整手牌进弃牌堆，轮到下一席位 */
export function fold(state: GameState, ctx?: ReduceContext): void {
  const player = state.players[state.active_player_idx];
  ctx?.logger?.debug(
    `${player.name} folds [${player.hand.map(card_to_string).join(' ')}].`,
  );
  state.discard_pile.push(...player.hand);
  player.hand = [];
  advance_turn(state, ctx);
}
