import type { Action, GameState } from '../types';

export interface StrategyContext {
  player_idx: number;
  /** 该席位可见的局面（player_view） */
  view: GameState;
}

/**
 * 选择器：从合法动作里挑一个；返回 null 表示弃牌 / 放弃正在进行的 7。
 */
export interface Strategy {
  choose(actions: Action[], ctx: StrategyContext): Action | null;
}
