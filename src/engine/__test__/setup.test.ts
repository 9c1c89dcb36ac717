import { describe, it, expect } from 'vitest';
import { initial_state } from '../setup';
import { validate_state } from '../validate';
import { cards_for_round } from '../effects/deal';
import { error_code } from './fixtures';

describe('initial_state', () => {
  it('deals 6 cards each from a full deck with every marble in its kennel', () => {
    const { game_state, state_hash } = initial_state({ seed: 42 });
    expect(game_state.round).toBe(1);
    expect(game_state.phase).toBe('RUNNING');
    expect(game_state.players.map((p) => p.hand.length)).toEqual([6, 6, 6, 6]);
    expect(game_state.draw_pile).toHaveLength(86);
    expect(game_state.discard_pile).toEqual([]);
    expect(game_state.players[1].marbles.map((m) => m.pos)).toEqual([72, 73, 74, 75]);
    expect(game_state.players.map((p) => p.name)).toEqual(['Player 1', 'Player 2', 'Player 3', 'Player 4']);
    expect(state_hash).toMatch(/^sha256:[0-9a-f]{64}$/);
    expect(validate_state(game_state).errors).toEqual([]);
  });

  it('the same seed reproduces the same deal', () => {
    const a = initial_state({ seed: 7 });
    const b = initial_state({ options: { seed: 7 } });
    expect(a.game_state).toEqual(b.game_state);
    expect(a.state_hash).toBe(b.state_hash);
    expect(initial_state({ seed: 8 }).state_hash).not.toBe(a.state_hash);
  });

  it('applies options and rejects invalid ones', () => {
    const { game_state } = initial_state({ options: { card_exchange: true, player_names: ['a', 'b', 'c', 'd'] } });
    expect(game_state.card_exchange_enabled).toBe(true);
    expect(game_state.players[3].name).toBe('d');

    expect(error_code(() => initial_state({ options: { player_names: ['a', 'b', 'c'] } }))).toBe('INVALID_OPTIONS');
  });
});

describe('cards_for_round', () => {
  it('cycles 6, 5, 4, 3, 2', () => {
    expect([1, 2, 3, 4, 5, 6].map(cards_for_round)).toEqual([6, 5, 4, 3, 2, 6]);
  });
});
