import type { Action, GameState, Rank, ReduceContext, TeamIdx } from '../types';
import { invalid_action } from './errors';
import {
  forward_destinations,
  is_beginning,
  is_in_kennel,
  is_on_track,
  is_path_blocked,
  start_square,
  type MarbleRef,
} from './helpers/board.util';
import { card_equals, card_to_string, index_of_card, JOKER, OPENING_RANKS } from './helpers/card.util';
import { apply_exchange, is_exchange_pending } from './effects/exchange';
import { find_movable, move_with_capture, swap_marbles } from './effects/move_marble';
import { apply_seven_step, is_seven_in_progress, is_virtual_card, restore_snapshot } from './effects/seven';
import { advance_turn, discard_played, fold } from './effects/turn';
import { check_victory } from './victory';

/**
 * 出牌处理器的入参：
 * - virtual：打出的是大王替代出的牌（不在手里，也不进弃牌堆）
 */
type PlayCtx = {
  state: GameState;
  action: Action;
  virtual: boolean;
  ctx?: ReduceContext;
};

type PlayHandler = (p: PlayCtx) => void;

/** 普通出牌的收尾：牌进弃牌堆，轮到下一席位 */
function finish_play({ state, action, virtual, ctx }: PlayCtx): void {
  discard_played(state, action.card, virtual);
  advance_turn(state, ctx);
}

/** 出狗窝：pos_from 必须是自家狗窝里的弹珠，pos_to 必须是其主人的出发格 */
function start_marble(p: PlayCtx, mover: MarbleRef): void {
  const { state, action } = p;
  const start = start_square(mover.player_idx);
  if (action.pos_to !== start || is_path_blocked(state, [start])) {
    throw invalid_action(`cannot enter the track at ${action.pos_to}`, {
      pos_from: action.pos_from,
      pos_to: action.pos_to,
    });
  }
  move_with_capture(state, mover, start);
  finish_play(p);
}

/** 前进 steps 格：pos_to 必须是前进规则给出的落点之一 */
function forward_marble(p: PlayCtx, mover: MarbleRef, steps: number, track_only = false): void {
  const { state, action } = p;
  const to = action.pos_to;
  const targets = forward_destinations(state, mover.player_idx, mover.marble.pos, steps).filter(
    (pos) => !track_only || is_on_track(pos),
  );
  if (to === undefined || !targets.includes(to)) {
    throw invalid_action(`cannot move ${steps} from ${action.pos_from} to ${to}`, {
      pos_from: action.pos_from,
      pos_to: to,
    });
  }
  move_with_capture(state, mover, to);
  finish_play(p);
}

const play_start: PlayHandler = (p) => {
  const mover = find_movable(p.state, p.action.pos_from);
  if (!is_in_kennel(mover.marble.pos, mover.player_idx)) {
    throw invalid_action('marble is not in its kennel', { pos_from: p.action.pos_from });
  }
  start_marble(p, mover);
};

function play_forward(steps: number): PlayHandler {
  return (p) => forward_marble(p, find_movable(p.state, p.action.pos_from), steps);
}

/** A：狗窝里的弹珠出发，赛道上的弹珠前进 1 格（不进终点道） */
const play_ace: PlayHandler = (p) => {
  const mover = find_movable(p.state, p.action.pos_from);
  if (is_in_kennel(mover.marble.pos, mover.player_idx)) {
    start_marble(p, mover);
    return;
  }
  forward_marble(p, mover, 1, true);
};

const play_jack: PlayHandler = (p) => {
  swap_marbles(p.state, p.action.pos_from, p.action.pos_to);
  finish_play(p);
};

/**
 * 大王：带 card_swap 时只做替代（大王立刻进弃牌堆，本回合不轮转）；否则按出狗窝处理。
 */
const play_joker: PlayHandler = (p) => {
  const { state, action, ctx } = p;
  const swap = action.card_swap;
  if (!swap) {
    play_start(p);
    return;
  }
  const player = state.players[state.active_player_idx];
  const beginning = is_beginning(state, state.active_player_idx);
  if (card_equals(swap, JOKER) || (beginning && !OPENING_RANKS.includes(swap.rank))) {
    throw invalid_action(`joker cannot stand in for ${card_to_string(swap)}`, { card_swap: swap });
  }
  discard_played(state, action.card, false);
  state.active_card = { ...swap };
  ctx?.logger?.debug(`${player.name} plays the joker as ${card_to_string(swap)}.`);
};

/** 7：逐步移动；步数用完才弃牌并轮转 */
const play_seven: PlayHandler = (p) => {
  if (apply_seven_step(p.state, p.action, p.ctx)) finish_play(p);
};

const no_move: PlayHandler = ({ action }) => {
  throw invalid_action(`${card_to_string(action.card)} has no move`, { card: action.card });
};

/** 点数 → 处理器；与 legal_actions 的生成器一一对应 */
const HANDLERS: Record<Rank, PlayHandler> = {
  '2': play_forward(2),
  '3': play_forward(3),
  '4': no_move,
  '5': play_forward(5),
  '6': play_forward(6),
  '7': play_seven,
  '8': play_forward(8),
  '9': play_forward(9),
  '10': play_forward(10),
  J: play_jack,
  Q: no_move,
  K: play_start,
  A: play_ace,
  JKR: play_joker,
};

/**
 * null 动作：
 * - 7 进行中：回滚到 7 之前并结束回合（不弃牌）
 * - 换牌阶段：不允许
 * - 否则：弃掉整手牌
 */
function apply_none(state: GameState, ctx?: ReduceContext): void {
  if (is_seven_in_progress(state)) {
    restore_snapshot(state);
    ctx?.logger?.debug(`${state.players[state.active_player_idx].name} aborts the seven.`);
    advance_turn(state, ctx);
    return;
  }
  if (is_exchange_pending(state)) {
    throw invalid_action('cannot pass during the card exchange', { player_idx: state.active_player_idx });
  }
  fold(state, ctx);
}

function play_card(state: GameState, action: Action, ctx?: ReduceContext): void {
  const hand = state.players[state.active_player_idx].hand;
  if (state.active_card ? !card_equals(action.card, state.active_card) : index_of_card(hand, action.card) < 0) {
    throw invalid_action(`${card_to_string(action.card)} cannot be played now`, {
      card: action.card,
      active_card: state.active_card,
    });
  }
  const virtual = is_virtual_card(state, action);
  ctx?.logger?.debug(
    `${state.players[state.active_player_idx].name} plays ${card_to_string(action.card)}` +
      (action.pos_from !== undefined ? ` ${action.pos_from} -> ${action.pos_to}` : ''),
  );
  HANDLERS[action.card.rank]({ state, action, virtual, ctx });
}

/**
 * 对当前席位执行一个动作（就地修改 state），之后跑一次胜负判定。
 * 非法动作直接抛 DogEngineError；返回本步决出的胜队。
 */
export function apply_action(state: GameState, action: Action | null, ctx?: ReduceContext): TeamIdx | null {
  if (state.phase === 'FINISHED') {
    throw invalid_action('game already finished', { winning_team: state.winning_team });
  }

  if (action === null) {
    apply_none(state, ctx);
  } else if (is_exchange_pending(state)) {
    apply_exchange(state, action, ctx);
  } else {
    play_card(state, action, ctx);
  }

  return check_victory(state, ctx);
}
