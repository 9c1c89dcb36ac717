import { format_issues, parse_state } from '../schema';
import type { Action, GameOptionsInput, GameState, ReduceContext, TeamIdx } from '../types';
import { apply_action } from './actions';
import { random_seed } from '../utils/rng.util';
import { DogEngineError } from './errors';
import { legal_actions } from './legal_actions';
import { initial_state } from './setup';
import { player_view } from './view';
import { check_victory } from './victory';

/**
 * 一局游戏的有状态外壳：持有当前 GameState，方法与函数式 API 一一对应。
 * 每局一个实例，实例之间互不共享任何状态。
 */
export class DogGame {
  private state: GameState;

  constructor(
    private readonly options: GameOptionsInput = {},
    private readonly context: ReduceContext = {},
  ) {
    this.state = initial_state({ seed: options.seed ?? random_seed(), options, context }).game_state;
  }

  /** 重新开局；seed 缺省时从当前 rng_state 接着洗，给定 seed 则可复现 */
  reset(seed?: number): void {
    this.state = initial_state({
      seed: seed ?? this.state.rng_state,
      options: this.options,
      context: this.context,
    }).game_state;
  }

  /** 当前完整状态（未遮蔽，返回的是内部引用） */
  get_state(): GameState {
    return this.state;
  }

  /** 整体替换状态；只校验结构，不校验领域不变量（测试用它搭局面） */
  set_state(state: unknown): void {
    const parsed = parse_state(state);
    if (!parsed.success) {
      throw new DogEngineError('INVALID_STATE', format_issues(parsed.error.issues), parsed.error.issues);
    }
    this.state = parsed.data;
  }

  get_list_action(): Action[] {
    return legal_actions(this.state);
  }

  /** 执行动作；返回本步决出的胜队（没有则为 null） */
  apply_action(action: Action | null): TeamIdx | null {
    return apply_action(this.state, action, this.context);
  }

  get_player_view(player_idx: number): GameState {
    return player_view(this.state, player_idx);
  }

  check_victory(): TeamIdx | null {
    return check_victory(this.state, this.context);
  }
}
