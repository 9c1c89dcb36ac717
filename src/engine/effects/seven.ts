import type { Action, GameState, ReduceContext, SevenSnapshot } from '../../types';
import { DogEngineError, invalid_action } from '../errors';
import { all_marbles, is_path_blocked, send_home, walk_path } from '../helpers/board.util';
import { card_equals, SEVEN_STEPS } from '../helpers/card.util';
import { find_movable } from './move_marble';

/** 本回合有一张 7 正在分步执行 */
export function is_seven_in_progress(state: GameState): boolean {
  return state.steps_remaining !== null;
}

/**
 * 打出的牌是否为虚拟牌（大王替代出来的、不在手里的那张）：
 * - 尚未开始分步：active_card 就是替代牌
 * - 7 已在进行：看开始前快照里的 active_card 是否已被占用
 */
export function is_virtual_card(state: GameState, action: Action): boolean {
  if (!state.active_card || !card_equals(state.active_card, action.card)) return false;
  return state.steps_remaining === null || state.seven_snapshot?.active_card != null;
}

function take_snapshot(state: GameState): SevenSnapshot {
  return structuredClone({
    marbles: state.players.map((p) => p.marbles),
    hands: state.players.map((p) => p.hand),
    active_card: state.active_card,
    steps_remaining: state.steps_remaining,
    active_player_idx: state.active_player_idx,
  });
}

/** 放弃正在进行的 7：所有分步移动原样回滚 */
export function restore_snapshot(state: GameState): void {
  const snap = state.seven_snapshot;
  if (!snap) return;
  const copy = structuredClone(snap);
  state.players.forEach((p, i) => {
    p.marbles = copy.marbles[i];
    p.hand = copy.hands[i];
  });
  state.active_card = copy.active_card;
  state.steps_remaining = copy.steps_remaining;
  state.active_player_idx = copy.active_player_idx;
  state.seven_snapshot = null;
}

/**
 * 7 的一次分步移动。先校验再改状态，失败时 state 不变。
 * 返回 true 表示 7 步已用完（调用方负责弃牌与轮转）。
 */
export function apply_seven_step(state: GameState, action: Action, ctx?: ReduceContext): boolean {
  const mover = find_movable(state, action.pos_from);
  const to = action.pos_to;
  const path = to === undefined ? null : walk_path(mover.player_idx, mover.marble.pos, to);
  if (to === undefined || !path) {
    throw invalid_action('seven cannot walk this path', { pos_from: action.pos_from, pos_to: to });
  }
  const budget = state.steps_remaining ?? SEVEN_STEPS;
  if (path.length > budget) {
    throw new DogEngineError('STEP_BUDGET_EXCEEDED', `move costs ${path.length}, ${budget} left`, {
      pos_from: action.pos_from,
      pos_to: to,
      cost: path.length,
      steps_remaining: budget,
    });
  }
  if (is_path_blocked(state, path)) {
    throw invalid_action('seven path is blocked', { pos_from: action.pos_from, pos_to: to });
  }

  if (state.steps_remaining === null) {
    state.seven_snapshot = take_snapshot(state);
    state.steps_remaining = SEVEN_STEPS;
    state.active_card = { ...action.card };
  }

  // 沿途只送回遇到的第一颗弹珠
  const others = all_marbles(state).filter((r) => r.marble !== mover.marble);
  for (const pos of path) {
    const hit = others.find((r) => r.marble.pos === pos);
    if (hit) {
      send_home(state, hit);
      break;
    }
  }
  mover.marble.pos = to;
  mover.marble.is_save = true;

  const left = budget - path.length;
  ctx?.logger?.debug(`Seven: ${action.pos_from} -> ${to}, ${left} step(s) left.`);
  if (left > 0) {
    state.steps_remaining = left;
    return false;
  }
  state.steps_remaining = null;
  state.seven_snapshot = null;
  return true;
}
