import type { GameState } from '../types';

/**
 * 某个席位能看到的局面（深拷贝，不影响原状态）：
 * - 其他玩家的手牌清空
 * - 牌堆与弃牌堆只保留为空数组
 * - 换牌槽只保留自己的那一格
 * - 去掉 7 的回滚快照与 RNG 状态
 */
export function player_view(state: GameState, player_idx: number): GameState {
  const view = structuredClone(state);
  view.players.forEach((p, i) => {
    if (i !== player_idx) p.hand = [];
  });
  view.draw_pile = [];
  view.discard_pile = [];
  view.exchange_buffer = view.exchange_buffer.map((c, i) => (i === player_idx ? c : null));
  view.seven_snapshot = null;
  view.rng_state = 0;
  return view;
}
