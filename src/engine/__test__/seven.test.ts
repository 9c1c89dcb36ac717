import { describe, it, expect } from 'vitest';
import { apply_action } from '../actions';
import { legal_actions } from '../legal_actions';
import { validate_state } from '../validate';
import { JOKER } from '../helpers/card.util';
import { base_state, card, error_code, give, place } from './fixtures';

const SEVEN = card('♠', '7');

describe('seven split moves', () => {
  it('60 → 70 for player 0 walks into the finish lane at a cost of 7', () => {
    const gs = base_state();
    give(gs, 0, [SEVEN]);
    place(gs, 0, 0, 60);

    expect(legal_actions(gs)).toContainEqual({ card: SEVEN, pos_from: 60, pos_to: 70 });
    apply_action(gs, { card: SEVEN, pos_from: 60, pos_to: 70 });

    expect(gs.players[0].marbles[0]).toEqual({ pos: 70, is_save: true });
    expect(gs.steps_remaining).toBeNull();
    expect(gs.seven_snapshot).toBeNull();
    expect(gs.active_card).toBeNull();
    expect(gs.players[0].hand).toEqual([]);
    expect(gs.discard_pile).toEqual([SEVEN]);
    expect(gs.active_player_idx).toBe(1);
  });

  it('splits the budget across marbles and rejects a sub-move over budget', () => {
    const gs = base_state();
    give(gs, 0, [SEVEN]);
    place(gs, 0, 0, 10);
    place(gs, 0, 1, 20);

    apply_action(gs, { card: SEVEN, pos_from: 10, pos_to: 13 });
    expect(gs.steps_remaining).toBe(4);
    expect(gs.active_card).toEqual(SEVEN);
    expect(gs.active_player_idx).toBe(0);
    // 7 还在手里，直到步数用完
    expect(gs.players[0].hand).toEqual([SEVEN]);
    expect(legal_actions(gs).map((a) => [a.pos_from, a.pos_to])).toEqual([
      [13, 14], [13, 15], [13, 16], [13, 17],
      [20, 21], [20, 22], [20, 23], [20, 24],
    ]);

    const before = structuredClone(gs);
    expect(error_code(() => apply_action(gs, { card: SEVEN, pos_from: 13, pos_to: 21 }))).toBe('STEP_BUDGET_EXCEEDED');
    expect(gs).toEqual(before);

    apply_action(gs, { card: SEVEN, pos_from: 20, pos_to: 24 });
    expect(gs.players[0].marbles.slice(0, 2)).toEqual([
      { pos: 13, is_save: true },
      { pos: 24, is_save: true },
    ]);
    expect(gs.steps_remaining).toBeNull();
    expect(gs.players[0].hand).toEqual([]);
    expect(gs.discard_pile).toEqual([SEVEN]);
    expect(gs.active_player_idx).toBe(1);
  });

  it('a safe marble blocks a later sub-move of the split', () => {
    const gs = base_state();
    give(gs, 0, [SEVEN]);
    place(gs, 0, 0, 10);
    place(gs, 0, 1, 30);
    place(gs, 1, 0, 13, true);

    apply_action(gs, { card: SEVEN, pos_from: 30, pos_to: 32 });
    expect(gs.steps_remaining).toBe(5);
    expect(legal_actions(gs).map((a) => [a.pos_from, a.pos_to])).toEqual([
      [10, 11], [10, 12],
      [32, 33], [32, 34], [32, 35], [32, 36], [32, 37],
    ]);

    const before = structuredClone(gs);
    expect(error_code(() => apply_action(gs, { card: SEVEN, pos_from: 10, pos_to: 14 }))).toBe('INVALID_ACTION');
    expect(gs).toEqual(before);
  });

  it('null in the middle of a seven rolls every sub-move back and ends the turn', () => {
    const gs = base_state();
    give(gs, 0, [SEVEN]);
    place(gs, 0, 0, 10);
    place(gs, 1, 0, 12);

    apply_action(gs, { card: SEVEN, pos_from: 10, pos_to: 13 });
    expect(gs.players[1].marbles[0]).toEqual({ pos: 72, is_save: false });

    apply_action(gs, null);
    expect(gs.players[0].marbles[0]).toEqual({ pos: 10, is_save: false });
    expect(gs.players[1].marbles[0]).toEqual({ pos: 12, is_save: false });
    expect(gs.players[0].hand).toEqual([SEVEN]);
    expect(gs.discard_pile).toEqual([]);
    expect(gs.steps_remaining).toBeNull();
    expect(gs.seven_snapshot).toBeNull();
    expect(gs.active_card).toBeNull();
    expect(gs.active_player_idx).toBe(1);
  });

  it('the walk sends home only the first marble it meets', () => {
    const gs = base_state();
    give(gs, 0, [SEVEN]);
    place(gs, 0, 0, 10);
    place(gs, 1, 0, 11);
    place(gs, 1, 1, 12);

    apply_action(gs, { card: SEVEN, pos_from: 10, pos_to: 12 });
    expect(gs.players[1].marbles[0]).toEqual({ pos: 72, is_save: false });
    expect(gs.players[1].marbles[1]).toEqual({ pos: 12, is_save: false });
    expect(gs.players[0].marbles[0]).toEqual({ pos: 12, is_save: true });

    const v = validate_state(gs);
    expect(v.errors).toEqual([]);
    expect(v.warnings).toEqual([
      { code: 'SHARED_SQUARE', path: '/players/1/marbles/1', message: 'shares position 12 with /players/0/marbles/0' },
    ]);
  });

  it('a kennel marble cannot walk with a seven', () => {
    const gs = base_state();
    give(gs, 0, [SEVEN]);
    expect(error_code(() => apply_action(gs, { card: SEVEN, pos_from: 65, pos_to: 68 }))).toBe('INVALID_ACTION');
    expect(gs.steps_remaining).toBeNull();
  });

  it('a seven substituted by the joker is never discarded', () => {
    const gs = base_state();
    give(gs, 0, [JOKER]);
    place(gs, 0, 0, 10);

    apply_action(gs, { card: JOKER, card_swap: SEVEN });
    apply_action(gs, { card: SEVEN, pos_from: 10, pos_to: 12 });
    expect(gs.seven_snapshot?.active_card).toEqual(SEVEN);

    apply_action(gs, { card: SEVEN, pos_from: 12, pos_to: 17 });
    expect(gs.players[0].marbles[0]).toEqual({ pos: 17, is_save: true });
    expect(gs.players[0].hand).toEqual([]);
    expect(gs.discard_pile).toEqual([JOKER]);
    expect(gs.active_player_idx).toBe(1);
    expect(validate_state(gs).errors).toEqual([]);
  });
});
