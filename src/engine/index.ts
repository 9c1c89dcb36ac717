import { engine_error, format_issues, parse_action } from '../schema';
import type { StepInput, StepOutput, TeamIdx } from '../types';
import { hash_state } from '../utils/canonical.util';
import { apply_action } from './actions';
import { is_engine_error } from './errors';
import { validate_state } from './validate';

/**
 * step()
 * ------
 * 函数式的单步推进：不修改入参，在副本上执行动作并跑一遍不变量检查。
 *  - 动作非法 / 7 超步数 / 发牌失败 → { ok:false, error }
 *  - 执行后状态违反不变量 → INVARIANT_FAILED
 */
export function step(input: StepInput): StepOutput {
  const { game_state, action, context } = input;

  // 校验 1：动作形状（null 表示弃牌 / 放弃 7）
  if (action !== null) {
    const parsed = parse_action(action);
    if (!parsed.success) {
      return {
        ok: false,
        error: engine_error('INVALID_ACTION', format_issues(parsed.error.issues), { action }),
      };
    }
  }

  const next = structuredClone(game_state);
  let winner: TeamIdx | null;
  try {
    winner = apply_action(next, action, context);
  } catch (e) {
    if (is_engine_error(e)) return { ok: false, error: e.to_json() };
    throw e;
  }

  const v = validate_state(next);
  if (v.errors.length) {
    return {
      ok: false,
      error: engine_error('INVARIANT_FAILED', 'state invariants violated', { errors: v.errors }),
    };
  }

  return { ok: true, next_state: next, winner, state_hash: hash_state(next) };
}

export { initial_state } from './setup';
export { legal_actions } from './legal_actions';
export { apply_action } from './actions';
export { check_victory } from './victory';
export { player_view } from './view';
export { validate_state } from './validate';
export { DogEngineError, is_engine_error, type DogErrorCode } from './errors';
export { DogGame } from './dog_game';
export type { Strategy, StrategyContext } from './strategy';
export { first_strategy, random_strategy, create_random_strategy } from './strategies';
export { auto_runner, type AutoRunnerOptions, type AutoRunnerSummary } from './auto_runner';
