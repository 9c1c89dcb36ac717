import type { GameState, Marble, TeamIdx } from '../../types';

// --- 位置编码 ------------------------------------------------------------
//   0..63            公共环形赛道，席位 i 的出发格为 16i
//   64+8i .. 67+8i   席位 i 的狗窝
//   68+8i .. 71+8i   席位 i 的终点道

export const PLAYER_COUNT = 4;
export const MARBLES_PER_PLAYER = 4;
export const TRACK_SIZE = 64;

const KENNEL_BASE = 64;
const FINISH_BASE = 68;
const SEAT_STRIDE = 8;
const START_STRIDE = 16;
const LANE_SIZE = 4;

export const kennel_start = (player_idx: number): number => KENNEL_BASE + SEAT_STRIDE * player_idx;
export const finish_start = (player_idx: number): number => FINISH_BASE + SEAT_STRIDE * player_idx;
export const start_square = (player_idx: number): number => START_STRIDE * player_idx;

const mod = (a: number, n: number): number => ((a % n) + n) % n;

export function is_on_track(pos: number): boolean {
  return pos >= 0 && pos < TRACK_SIZE;
}

export function is_in_kennel(pos: number, owner: number): boolean {
  const k = kennel_start(owner);
  return pos >= k && pos < k + LANE_SIZE;
}

export function is_in_finish(pos: number, owner: number): boolean {
  const f = finish_start(owner);
  return pos >= f && pos < f + LANE_SIZE;
}

export type Zone = 'kennel' | 'track' | 'finish';

/** 弹珠相对其主人的区域；不属于任何合法区域时为 null */
export function zone_of(pos: number, owner: number): Zone | null {
  if (is_on_track(pos)) return 'track';
  if (is_in_kennel(pos, owner)) return 'kennel';
  if (is_in_finish(pos, owner)) return 'finish';
  return null;
}

// --- 席位与队伍 ------------------------------------------------------------

export const partner_of = (player_idx: number): number => (player_idx + 2) % PLAYER_COUNT;

export const team_of = (player_idx: number): TeamIdx => (player_idx % 2 === 0 ? 0 : 1);

export function is_player_finished(state: GameState, player_idx: number): boolean {
  return state.players[player_idx].marbles.every((m) => is_in_finish(m.pos, player_idx));
}

/** 开局阶段：该席位自己的 4 颗弹珠都还在狗窝 */
export function is_beginning(state: GameState, player_idx: number): boolean {
  return state.players[player_idx].marbles.every((m) => is_in_kennel(m.pos, player_idx));
}

/**
 * 当前席位可操作的玩家：自己；自己 4 颗弹珠全部进终点后再加上队友。
 */
export function movable_player_indices(state: GameState): number[] {
  const active = state.active_player_idx;
  return is_player_finished(state, active) ? [active, partner_of(active)] : [active];
}

// --- 弹珠查找 ------------------------------------------------------------

export type MarbleRef = { player_idx: number; marble_idx: number; marble: Marble };

export function marbles_of(state: GameState, player_indices: number[]): MarbleRef[] {
  return player_indices.flatMap((player_idx) =>
    state.players[player_idx].marbles.map((marble, marble_idx) => ({ player_idx, marble_idx, marble })),
  );
}

export function all_marbles(state: GameState): MarbleRef[] {
  return marbles_of(state, state.players.map((_, i) => i));
}

export function movable_marbles(state: GameState): MarbleRef[] {
  return marbles_of(state, movable_player_indices(state));
}

/** J 可交换的对方弹珠：对方队伍、在赛道上、不安全 */
export function jack_targets(state: GameState): MarbleRef[] {
  const team = team_of(state.active_player_idx);
  return all_marbles(state).filter(
    (r) => team_of(r.player_idx) !== team && is_on_track(r.marble.pos) && !r.marble.is_save,
  );
}

/** 送回狗窝：放到主人狗窝的第一个空位，清除安全标记 */
export function send_home(state: GameState, ref: MarbleRef): void {
  const own = state.players[ref.player_idx].marbles;
  const base = kennel_start(ref.player_idx);
  let target = base;
  for (let k = 0; k < LANE_SIZE; k++) {
    if (!own.some((m) => m !== ref.marble && m.pos === base + k)) {
      target = base + k;
      break;
    }
  }
  ref.marble.pos = target;
  ref.marble.is_save = false;
}

// --- 路径 ------------------------------------------------------------

/**
 * 席位 owner 的弹珠从 from 前进到 to 时经过并落脚的格子（不含 from）。
 * - 赛道 → 赛道：沿环形顺时针
 * - 赛道 → 自家终点道：先走到自家出发格，再进入终点道
 * - 终点道内：只能向前
 * 其余组合无法行走，返回 null。
 */
export function walk_path(owner: number, from: number, to: number): number[] | null {
  if (is_on_track(from) && is_on_track(to)) {
    const n = mod(to - from, TRACK_SIZE);
    if (n === 0) return null;
    return Array.from({ length: n }, (_, k) => (from + k + 1) % TRACK_SIZE);
  }
  if (is_on_track(from) && is_in_finish(to, owner)) {
    const d = mod(start_square(owner) - from, TRACK_SIZE);
    const track = Array.from({ length: d }, (_, k) => (from + k + 1) % TRACK_SIZE);
    const lane = Array.from({ length: to - finish_start(owner) + 1 }, (_, k) => finish_start(owner) + k);
    return [...track, ...lane];
  }
  if (is_in_finish(from, owner) && is_in_finish(to, owner) && to > from) {
    return Array.from({ length: to - from }, (_, k) => from + k + 1);
  }
  return null;
}

/** 赛道格上有安全弹珠即阻挡；终点道不可越过任何弹珠 */
export function is_path_blocked(state: GameState, path: number[]): boolean {
  const marbles = all_marbles(state);
  return path.some((pos) =>
    marbles.some((r) => r.marble.pos === pos && (!is_on_track(pos) || r.marble.is_save)),
  );
}

/**
 * 弹珠前进 steps 格可到达的落点：
 * - 赛道上：环形前进的落点；若途经自家出发格，还可拐入终点道（步数须恰好落在道内）
 * - 终点道内：道内前进
 * - 狗窝：无
 */
export function forward_destinations(state: GameState, owner: number, from: number, steps: number): number[] {
  const out: number[] = [];
  const reachable = (to: number) => {
    const path = walk_path(owner, from, to);
    if (path && path.length === steps && !is_path_blocked(state, path)) out.push(to);
  };

  if (is_on_track(from)) {
    reachable((from + steps) % TRACK_SIZE);
    const d = mod(start_square(owner) - from, TRACK_SIZE);
    const lane = steps - d - 1;
    if (d > 0 && lane >= 0 && lane < LANE_SIZE) reachable(finish_start(owner) + lane);
  } else if (is_in_finish(from, owner) && is_in_finish(from + steps, owner)) {
    reachable(from + steps);
  }
  return out;
}
