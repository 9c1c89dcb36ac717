import { describe, it, expect } from 'vitest';
import { first_strategy, create_random_strategy, random_strategy } from './strategies';
import { legal_actions } from './legal_actions';
import { player_view } from './view';
import { base_state, card, give } from './__test__/fixtures';

function ctx_state() {
  const gs = base_state();
  give(gs, 0, [card('♠', 'A')]);
  return gs;
}

describe('built-in strategies', () => {
  it('first_strategy picks the first legal action', () => {
    const gs = ctx_state();
    const actions = legal_actions(gs);
    expect(actions).toHaveLength(4);
    expect(first_strategy.choose(actions, { player_idx: 0, view: player_view(gs, 0) })).toEqual(actions[0]);
  });

  it('random strategy draws from the injected source', () => {
    const gs = ctx_state();
    const actions = legal_actions(gs);
    const ctx = { player_idx: 0, view: player_view(gs, 0) };
    expect(create_random_strategy(() => 0.99).choose(actions, ctx)).toEqual(actions[3]);
    expect(create_random_strategy(() => 0.3).choose(actions, ctx)).toEqual(actions[1]);
    expect(actions).toContain(random_strategy.choose(actions, ctx));
  });

  it('both return null on empty input', () => {
    const view = player_view(base_state(), 0);
    expect(random_strategy.choose([], { player_idx: 0, view })).toBeNull();
    expect(first_strategy.choose([], { player_idx: 0, view })).toBeNull();
  });
});
