import { RANKS, SUITS } from '../../schema';
import type { Card, Rank } from '../../types';

/** 每副牌的大王数量（两副共 6 张） */
const JOKERS_PER_DECK = 3;
const DECKS = 2;

/** 整副牌张数：2 × (4 × 13 + 3) = 110，全局守恒 */
export const DECK_SIZE = DECKS * (SUITS.length * (RANKS.length - 1) + JOKERS_PER_DECK);

export const JOKER: Card = { suit: '', rank: 'JKR' };

/** 开局阶段大王只能替代成 A / K */
export const OPENING_RANKS: readonly Rank[] = ['A', 'K'];

/** 一张 7 的总步数 */
export const SEVEN_STEPS = 7;

/**
 * 构造固定顺序的整副牌：按点数 2..A，每个点数按花色 ♠♥♦♣，随后 3 张大王；重复两副。
 */
export function build_deck(): Card[] {
  const out: Card[] = [];
  for (let d = 0; d < DECKS; d++) {
    for (const rank of RANKS) {
      if (rank === 'JKR') continue;
      for (const suit of SUITS) out.push({ suit, rank });
    }
    for (let j = 0; j < JOKERS_PER_DECK; j++) out.push({ ...JOKER });
  }
  return out;
}

/** 值相等：花色与点数都相同的两张牌可互换 */
export function card_equals(a: Card, b: Card): boolean {
  return a.suit === b.suit && a.rank === b.rank;
}

/** 展示用字符串，同时作为可哈希的键（用于 Map / Set）：♠A、♥10、JKR */
export function card_to_string(card: Card): string {
  return `${card.suit}${card.rank}`;
}

export function rank_index(rank: Rank): number {
  return RANKS.indexOf(rank);
}

function suit_index(card: Card): number {
  // 大王无花色，排在最后
  return card.suit === '' ? SUITS.length : SUITS.indexOf(card.suit);
}

/** 全序：先花色后点数；仅用于展示与测试 */
export function compare_cards(a: Card, b: Card): number {
  return suit_index(a) - suit_index(b) || rank_index(a.rank) - rank_index(b.rank);
}

/** 手牌中第一张与 card 值相等的牌的下标，没有则为 -1 */
export function index_of_card(hand: Card[], card: Card): number {
  return hand.findIndex((c) => card_equals(c, card));
}

/** 从手牌移除一张与 card 值相等的牌；不存在时返回 false */
export function remove_card(hand: Card[], card: Card): boolean {
  const idx = index_of_card(hand, card);
  if (idx < 0) return false;
  hand.splice(idx, 1);
  return true;
}
