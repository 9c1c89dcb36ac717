import type { Card, GameState } from '../../types';
import { mulberry32 } from '../../utils/rng.util';

/**
 * Fisher–Yates 洗牌；随机数只来自 state.rng_state，洗完回写 RNG 状态。
 * 同一 rng_state → 完全一致的排列。
 */
export function shuffle_cards(state: GameState, cards: Card[]): Card[] {
  const rng = mulberry32(state.rng_state);
  const items = [...cards];
  for (let i = items.length - 1; i > 0; i--) {
    const j = rng.next_uint32() % (i + 1);
    const tmp = items[i];
    items[i] = items[j];
    items[j] = tmp;
  }
  state.rng_state = rng.state;
  return items;
}
