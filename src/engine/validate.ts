import type { Card, GameState } from "../types";
import { all_marbles, zone_of } from "./helpers/board.util";
import { build_deck, card_to_string, DECK_SIZE } from "./helpers/card.util";

export type Issue = { code: string; path: string; message: string };

/** 按牌面计数 */
function count_cards(cards: Card[]): Map<string, number> {
  const out = new Map<string, number>();
  for (const c of cards) {
    const key = card_to_string(c);
    out.set(key, (out.get(key) ?? 0) + 1);
  }
  return out;
}

/**
 * 领域不变量检查（结构校验见 schema/state.schema.ts）：
 * - errors：违反即说明引擎出了 bug（step() 会报 INVARIANT_FAILED）
 * - warnings：规则允许但值得注意的局面
 */
export function validate_state(state: GameState) {
  const errors: Issue[] = [];
  const warnings: Issue[] = [];

  // —— CARD_CONSERVATION：手牌 + 牌堆 + 弃牌堆 恰好是一整副（110 张，逐牌面计数一致）
  const cards = [...state.players.flatMap((p) => p.hand), ...state.draw_pile, ...state.discard_pile];
  if (cards.length !== DECK_SIZE) {
    errors.push({
      code: "INVARIANT_CARD_CONSERVATION",
      path: "/",
      message: `expected ${DECK_SIZE} cards, found ${cards.length}`,
    });
  } else {
    const expected = count_cards(build_deck());
    const actual = count_cards(cards);
    for (const [key, n] of expected) {
      const got = actual.get(key) ?? 0;
      if (got !== n) {
        errors.push({
          code: "INVARIANT_CARD_CONSERVATION",
          path: "/",
          message: `card '${key}' appears ${got} time(s), expected ${n}`,
        });
      }
    }
  }

  // —— MARBLE_ZONE：弹珠只能在公共赛道、自家狗窝或自家终点道
  for (const { player_idx, marble_idx, marble } of all_marbles(state)) {
    if (zone_of(marble.pos, player_idx) === null) {
      errors.push({
        code: "INVARIANT_MARBLE_ZONE",
        path: `/players/${player_idx}/marbles/${marble_idx}/pos`,
        message: `position ${marble.pos} is outside player ${player_idx}'s zones`,
      });
    }
  }

  // —— SEVEN_CONTEXT：步数预算与快照同生同灭，且进行中的牌必须是 7
  const seven_open = state.steps_remaining !== null;
  if (seven_open !== (state.seven_snapshot !== null)) {
    errors.push({
      code: "INVARIANT_SEVEN_CONTEXT",
      path: "/steps_remaining",
      message: "steps_remaining and seven_snapshot must be set together",
    });
  }
  if (seven_open && state.active_card?.rank !== "7") {
    errors.push({
      code: "INVARIANT_SEVEN_CONTEXT",
      path: "/active_card",
      message: "a seven in progress needs the seven as active_card",
    });
  }

  // —— FINISHED：终局与胜队同时出现
  if ((state.phase === "FINISHED") !== (state.winning_team !== null)) {
    errors.push({
      code: "INVARIANT_FINISHED",
      path: "/winning_team",
      message: `phase ${state.phase} with winning_team ${state.winning_team}`,
    });
  }

  // —— SHARED_SQUARE（警告）：7 的行走只送回遇到的第一颗弹珠，可能出现同格
  const seen = new Map<number, string>();
  for (const { player_idx, marble_idx, marble } of all_marbles(state)) {
    const here = `/players/${player_idx}/marbles/${marble_idx}`;
    const first = seen.get(marble.pos);
    if (first) {
      warnings.push({
        code: "SHARED_SQUARE",
        path: here,
        message: `shares position ${marble.pos} with ${first}`,
      });
    } else {
      seen.set(marble.pos, here);
    }
  }

  return { errors, warnings };
}
