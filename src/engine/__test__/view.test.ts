import { describe, it, expect } from 'vitest';
import { player_view } from '../view';
import { initial_state } from '../setup';

describe('player_view', () => {
  it('hides other hands, the piles and the rng state without touching the source', () => {
    const { game_state } = initial_state({ seed: 3 });
    game_state.exchange_buffer = [game_state.players[0].hand[0], game_state.players[1].hand[0], null, null];

    const view = player_view(game_state, 1);
    expect(view.players.map((p) => p.hand.length)).toEqual([0, 6, 0, 0]);
    expect(view.players[1].hand).toEqual(game_state.players[1].hand);
    expect(view.draw_pile).toEqual([]);
    expect(view.discard_pile).toEqual([]);
    expect(view.exchange_buffer).toEqual([null, game_state.players[1].hand[0], null, null]);
    expect(view.seven_snapshot).toBeNull();
    expect(view.rng_state).toBe(0);

    expect(game_state.draw_pile).toHaveLength(86);
    expect(game_state.players[0].hand).toHaveLength(6);
  });
});
