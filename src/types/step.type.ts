/** ---------------------------
 *  开局 / 单步推进（输入 / 上下文 / 输出）
 * ---------------------------*/

import type { z } from 'zod';
import type { GameOptionsSchema } from '../schema';
import type { Action, EngineError, GameState, TeamIdx } from './game.type';

/** 开局参数（zod 解析后的形状，缺省字段已补齐） */
export type GameOptions = z.infer<typeof GameOptionsSchema>;

/** 开局参数的输入形状（字段均可省略） */
export type GameOptionsInput = z.input<typeof GameOptionsSchema>;

/**
 * 引擎写日志只用到这两个级别；传入 console 即可。
 */
export type Logger = Pick<Console, 'info' | 'debug'>;

/** 执行上下文（非规则的一部分，属于引擎运行策略） */
export interface ReduceContext {
  /** 可选日志出口；缺省时引擎不输出任何内容。 */
  logger?: Logger;
}

/** 开局输入 */
export interface InitialStateInput {
  /** 洗牌种子；给出时覆盖 options.seed。 */
  seed?: number;
  /** 开局参数（zod 校验并补默认值）。 */
  options?: GameOptionsInput;
  /** 可选：执行上下文。 */
  context?: ReduceContext;
}

/** 开局输出 */
export interface InitialStateOutput {
  game_state: GameState;
  /** game_state 的哈希（sha256:...）。 */
  state_hash: string;
}

/** 单步推进输入 */
export interface StepInput {
  /** 当前完整游戏状态（不会被就地修改）。 */
  game_state: GameState;
  /** 本次要执行的动作；null 表示弃牌 / 放弃正在进行的 7。 */
  action: Action | null;
  /** 可选：执行上下文。 */
  context?: ReduceContext;
}

/** 单步推进输出 */
export interface StepOutput {
  /** 是否执行成功（成功则必须给出 next_state 与 state_hash）。 */
  ok: boolean;
  /** 成功时：下一状态。 */
  next_state?: GameState;
  /** 成功时：本步决出的胜队（未决出为 null）。 */
  winner?: TeamIdx | null;
  /** 失败时：结构化引擎错误（如 INVALID_ACTION / STEP_BUDGET_EXCEEDED 等）。 */
  error?: EngineError;
  /** 成功时：next_state 的哈希（sha256:...）。 */
  state_hash?: string;
}

// 事件（轨迹记录用）
export interface Event {
  // 局内序号（从 1 开始）
  seq: number;
  // 行动席位
  player_idx: number;
  // null 即弃牌 / 放弃 7
  action: Action | null;
  // 行动后状态哈希
  state_hash: string;
}
