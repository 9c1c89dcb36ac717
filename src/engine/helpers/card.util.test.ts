import { describe, it, expect } from 'vitest';
import { build_deck, card_equals, card_to_string, compare_cards, DECK_SIZE, JOKER, remove_card } from './card.util';
import type { Card } from '../../types';

describe('card helpers', () => {
  it('builds two decks of 55 cards in a fixed order', () => {
    const deck = build_deck();
    expect(deck).toHaveLength(110);
    expect(DECK_SIZE).toBe(110);
    expect(deck.slice(0, 2)).toEqual([
      { suit: '♠', rank: '2' },
      { suit: '♥', rank: '2' },
    ]);
    expect(deck.slice(52, 55)).toEqual([JOKER, JOKER, JOKER]);
    expect(deck[55]).toEqual({ suit: '♠', rank: '2' });
    expect(deck.filter((c) => card_equals(c, JOKER))).toHaveLength(6);
    expect(deck.filter((c) => card_to_string(c) === '♠A')).toHaveLength(2);
  });

  it('removes one matching card at a time', () => {
    const hand: Card[] = [
      { suit: '♦', rank: '7' },
      { suit: '♦', rank: '7' },
    ];
    expect(remove_card(hand, { suit: '♦', rank: '7' })).toBe(true);
    expect(hand).toHaveLength(1);
    expect(remove_card(hand, { suit: '♣', rank: '7' })).toBe(false);
    expect(hand).toHaveLength(1);
  });

  it('orders cards by suit, then rank, jokers last', () => {
    const cards: Card[] = [JOKER, { suit: '♥', rank: 'A' }, { suit: '♠', rank: '10' }, { suit: '♠', rank: '2' }];
    expect(cards.sort(compare_cards).map(card_to_string)).toEqual(['♠2', '♠10', '♥A', 'JKR']);
  });
});
