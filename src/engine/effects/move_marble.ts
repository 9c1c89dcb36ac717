import type { GameState } from '../../types';
import { invalid_action } from '../errors';
import {
  all_marbles,
  is_on_track,
  jack_targets,
  movable_marbles,
  send_home,
  type MarbleRef,
} from '../helpers/board.util';

/** 当前席位在 pos 上可操作的弹珠；没有则 INVALID_ACTION */
export function find_movable(state: GameState, pos: number | undefined): MarbleRef {
  const ref = pos === undefined ? undefined : movable_marbles(state).find((r) => r.marble.pos === pos);
  if (!ref) {
    throw invalid_action(`no movable marble at position ${pos}`, {
      player_idx: state.active_player_idx,
      pos,
    });
  }
  return ref;
}

/**
 * 普通移动：目标格上若有别的弹珠，先把它送回其主人的狗窝；
 * 移动的弹珠落在 to 上并变为安全。
 */
export function move_with_capture(state: GameState, mover: MarbleRef, to: number): MarbleRef | null {
  const victim = all_marbles(state).find((r) => r.marble.pos === to && r.marble !== mover.marble) ?? null;
  if (victim) send_home(state, victim);
  mover.marble.pos = to;
  mover.marble.is_save = true;
  return victim;
}

/**
 * J 的交换：一方是当前席位可操作、在赛道上的弹珠，另一方是 jack_targets 里的对方弹珠；
 * 没有对方目标时才允许两颗己方可操作弹珠互换。只交换位置，安全标记随弹珠走。
 */
export function swap_marbles(state: GameState, pos_from: number | undefined, pos_to: number | undefined): void {
  const at = (pos: number | undefined) =>
    pos === undefined ? [] : all_marbles(state).filter((r) => r.marble.pos === pos && is_on_track(pos));
  const own = movable_marbles(state).map((r) => r.marble);
  const targets = jack_targets(state).map((r) => r.marble);
  const fits = (x: MarbleRef, y: MarbleRef) =>
    own.includes(x.marble) && (targets.length === 0 ? own.includes(y.marble) : targets.includes(y.marble));

  for (const a of at(pos_from)) {
    for (const b of at(pos_to)) {
      if (a.marble === b.marble || !(fits(a, b) || fits(b, a))) continue;
      const tmp = a.marble.pos;
      a.marble.pos = b.marble.pos;
      b.marble.pos = tmp;
      return;
    }
  }
  throw invalid_action('no legal jack swap between these positions', {
    player_idx: state.active_player_idx,
    pos_from,
    pos_to,
  });
}
