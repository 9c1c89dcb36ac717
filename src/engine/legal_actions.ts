import { RANKS, SUITS } from "../schema";
import type { Action, Card, GameState, Rank } from "../types";
import { ActionSet, move } from "./helpers/action.util";
import {
  forward_destinations,
  is_beginning,
  is_in_kennel,
  is_on_track,
  is_path_blocked,
  jack_targets,
  movable_marbles,
  start_square,
  type MarbleRef,
} from "./helpers/board.util";
import { OPENING_RANKS, SEVEN_STEPS } from "./helpers/card.util";
import { is_exchange_pending } from "./effects/exchange";

/**
 * 单张牌的枚举上下文：
 * - card：正在枚举的牌（手牌或 active_card）
 * - marbles：当前席位可操作的弹珠（自己；自己全进终点后含队友）
 * - beginning：当前席位自己的 4 颗弹珠是否都还在狗窝（开局阶段）
 */
type GenerateCtx = {
  state: GameState;
  card: Card;
  marbles: MarbleRef[];
  beginning: boolean;
};

type ActionGenerator = (ctx: GenerateCtx) => Action[];

/**
 * 出狗窝：每颗狗窝里的弹珠 → 主人的出发格；出发格上有安全弹珠时不可出。
 */
function start_actions({ state, card, marbles }: GenerateCtx): Action[] {
  const out: Action[] = [];
  for (const { player_idx, marble } of marbles) {
    if (!is_in_kennel(marble.pos, player_idx)) continue;
    const start = start_square(player_idx);
    if (is_path_blocked(state, [start])) continue;
    out.push(move(card, marble.pos, start));
  }
  return out;
}

/** 固定步数前进（数字牌） */
function forward_actions(steps: number): ActionGenerator {
  return ({ state, card, marbles }) =>
    marbles.flatMap(({ player_idx, marble }) =>
      forward_destinations(state, player_idx, marble.pos, steps).map((to) => move(card, marble.pos, to)),
    );
}

/** A：出狗窝，或赛道上前进 1 格（不进终点道） */
const ace_actions: ActionGenerator = (ctx) => {
  const { state, card, marbles } = ctx;
  const advance = marbles.flatMap(({ player_idx, marble }) =>
    is_on_track(marble.pos)
      ? forward_destinations(state, player_idx, marble.pos, 1)
          .filter(is_on_track)
          .map((to) => move(card, marble.pos, to))
      : [],
  );
  return [...start_actions(ctx), ...advance];
};

/**
 * J：己方赛道弹珠与对方赛道上非安全弹珠互换，两个方向都合法；
 * 对方没有可换目标时，退化为己方赛道弹珠两两互换。同格的两颗弹珠不构成交换。
 */
const jack_actions: ActionGenerator = ({ state, card, marbles }) => {
  const own = marbles.filter((r) => is_on_track(r.marble.pos));
  const targets = jack_targets(state);

  const out: Action[] = [];
  if (targets.length > 0) {
    for (const a of own) {
      for (const b of targets) {
        if (a.marble.pos === b.marble.pos) continue;
        out.push(move(card, a.marble.pos, b.marble.pos), move(card, b.marble.pos, a.marble.pos));
      }
    }
    return out;
  }

  own.forEach((a, i) => {
    for (const b of own.slice(i + 1)) {
      if (a.marble.pos === b.marble.pos) continue;
      out.push(move(card, a.marble.pos, b.marble.pos), move(card, b.marble.pos, a.marble.pos));
    }
  });
  return out;
};

/**
 * 大王：可直接出狗窝；或声明替代成另一张牌（本回合随后按那张牌出）。
 */
const joker_actions: ActionGenerator = (ctx) => {
  const { card, beginning } = ctx;
  const swaps: Action[] = [];
  for (const suit of SUITS) {
    for (const rank of beginning ? OPENING_RANKS : RANKS) {
      if (rank === "JKR") continue;
      swaps.push({ card, card_swap: { suit, rank } });
    }
  }
  return [...start_actions(ctx), ...swaps];
};

/**
 * 7：拆分成若干次前进，每次 1..steps_remaining 格，规则同数字牌。
 */
const seven_actions: ActionGenerator = ({ state, card, marbles }) => {
  const remaining = state.steps_remaining ?? SEVEN_STEPS;
  const out: Action[] = [];
  for (const { player_idx, marble } of marbles) {
    for (let n = 1; n <= remaining; n++) {
      for (const to of forward_destinations(state, player_idx, marble.pos, n)) {
        out.push(move(card, marble.pos, to));
      }
    }
  }
  return out;
};

const no_actions: ActionGenerator = () => [];

/** 点数 → 生成器；Record<Rank, …> 保证新增点数时编译期就会报缺 */
const GENERATORS: Record<Rank, ActionGenerator> = {
  "2": forward_actions(2),
  "3": forward_actions(3),
  "4": no_actions,
  "5": forward_actions(5),
  "6": forward_actions(6),
  "7": seven_actions,
  "8": forward_actions(8),
  "9": forward_actions(9),
  "10": forward_actions(10),
  J: jack_actions,
  Q: no_actions,
  K: start_actions,
  A: ace_actions,
  JKR: joker_actions,
};

/**
 * 枚举当前席位的全部合法动作：
 * - 对局已结束：空
 * - 换牌阶段：手里每种牌一条 { card }
 * - 否则：active_card 存在时只看这一张，否则看整手牌；按点数分发
 *
 * 纯读取，不修改 state；结果按结构键去重。
 */
export function legal_actions(state: GameState): Action[] {
  if (state.phase === "FINISHED") return [];

  const active = state.active_player_idx;
  const player = state.players[active];
  const out = new ActionSet();

  if (is_exchange_pending(state)) {
    for (const card of player.hand) out.add({ card });
    return out.to_array();
  }

  const ctx_base = {
    state,
    marbles: movable_marbles(state),
    beginning: is_beginning(state, active),
  };
  const cards = state.active_card ? [state.active_card] : player.hand;
  for (const card of cards) {
    out.add_all(GENERATORS[card.rank]({ ...ctx_base, card }));
  }
  return out.to_array();
}
