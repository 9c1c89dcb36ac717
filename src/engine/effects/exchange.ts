import type { Action, GameState, ReduceContext } from '../../types';
import { invalid_action } from '../errors';
import { card_to_string, index_of_card, remove_card } from '../helpers/card.util';
import { PLAYER_COUNT, partner_of } from '../helpers/board.util';

/** 本轮的换牌还没完成 */
export function is_exchange_pending(state: GameState): boolean {
  return state.card_exchange_enabled && !state.card_exchanged;
}

/**
 * 换牌阶段的一步：当前席位选出一张牌放进自己的交换槽，轮到下一席位。
 * 牌在交付前仍留在手里（总数守恒不受影响），四个槽都满后一次性交给对面的队友。
 */
export function apply_exchange(state: GameState, action: Action | null, ctx?: ReduceContext): void {
  const idx = state.active_player_idx;
  const player = state.players[idx];
  if (action === null || index_of_card(player.hand, action.card) < 0) {
    throw invalid_action('card exchange requires choosing one of your cards', { player_idx: idx });
  }
  if (state.exchange_buffer[idx] !== null) {
    throw invalid_action('player already chose a card for this exchange', { player_idx: idx });
  }

  state.exchange_buffer[idx] = { ...action.card };
  state.active_player_idx = (idx + 1) % PLAYER_COUNT;
  ctx?.logger?.debug(`${player.name} set aside ${card_to_string(action.card)} for the exchange.`);

  if (state.exchange_buffer.some((c) => c === null)) return;

  const given = [...state.exchange_buffer];
  given.forEach((card, i) => {
    if (card) remove_card(state.players[i].hand, card);
  });
  given.forEach((_, i) => {
    const card = given[partner_of(i)];
    if (card) state.players[i].hand.push(card);
  });
  state.exchange_buffer = [null, null, null, null];
  state.card_exchanged = true;
  state.active_player_idx = state.started_player_idx;
  ctx?.logger?.info(`Card exchange for round ${state.round} completed.`);
}
