import { describe, it, expect } from 'vitest';
import {
  finish_start,
  forward_destinations,
  kennel_start,
  movable_player_indices,
  send_home,
  start_square,
  walk_path,
  zone_of,
  is_beginning,
  jack_targets,
} from './board.util';
import { base_state, place } from '../__test__/fixtures';

describe('board positions', () => {
  it('maps seats onto kennel, start and finish squares', () => {
    expect(kennel_start(2)).toBe(80);
    expect(finish_start(3)).toBe(92);
    expect(start_square(3)).toBe(48);
    expect(zone_of(70, 0)).toBe('finish');
    expect(zone_of(70, 1)).toBeNull();
    expect(zone_of(77, 1)).toBe('finish');
    expect(zone_of(5, 3)).toBe('track');
    expect(zone_of(89, 3)).toBe('kennel');
  });

  it('walks the track, into the own finish lane, and forward inside it', () => {
    expect(walk_path(0, 60, 70)).toEqual([61, 62, 63, 0, 68, 69, 70]);
    expect(walk_path(0, 62, 2)).toEqual([63, 0, 1, 2]);
    expect(walk_path(2, 30, 84)).toEqual([31, 32, 84]);
    expect(walk_path(0, 69, 71)).toEqual([70, 71]);
    expect(walk_path(1, 10, 70)).toBeNull();
    expect(walk_path(0, 70, 69)).toBeNull();
    expect(walk_path(0, 64, 0)).toBeNull();
  });
});

describe('forward_destinations', () => {
  it('offers the track square and the finish lane square when passing the own start', () => {
    const gs = base_state();
    place(gs, 0, 0, 62);
    expect(forward_destinations(gs, 0, 62, 3)).toEqual([1, 68]);
    // 正好在自家出发格上：不能直接拐进终点道
    expect(forward_destinations(gs, 0, 0, 2)).toEqual([2]);
  });

  it('stops at safe marbles on the track and at any marble in the lane', () => {
    const gs = base_state();
    place(gs, 1, 0, 16, true);
    expect(forward_destinations(gs, 0, 14, 3)).toEqual([]);
    gs.players[1].marbles[0].is_save = false;
    expect(forward_destinations(gs, 0, 14, 3)).toEqual([17]);

    place(gs, 0, 0, 69);
    expect(forward_destinations(gs, 0, 69, 2)).toEqual([71]);
    place(gs, 0, 1, 70);
    expect(forward_destinations(gs, 0, 69, 2)).toEqual([]);
    expect(forward_destinations(gs, 0, 69, 3)).toEqual([]);
  });

  it('kennel marbles never move forward', () => {
    expect(forward_destinations(base_state(), 0, 64, 1)).toEqual([]);
  });
});

describe('marbles', () => {
  it('send_home uses the first free kennel square and clears the safe flag', () => {
    const gs = base_state();
    place(gs, 1, 0, 20, true);
    place(gs, 1, 1, 30, true);
    send_home(gs, { player_idx: 1, marble_idx: 1, marble: gs.players[1].marbles[1] });
    expect(gs.players[1].marbles[1]).toEqual({ pos: 72, is_save: false });
  });

  it('jack_targets lists unsafe opponent marbles on the track', () => {
    const gs = base_state();
    place(gs, 1, 0, 20);
    place(gs, 1, 1, 30, true);
    place(gs, 2, 0, 40);
    place(gs, 3, 0, 50);
    place(gs, 3, 1, 92);
    expect(jack_targets(gs).map((r) => [r.player_idx, r.marble.pos])).toEqual([[1, 20], [3, 50]]);
  });

  it('is_beginning holds while all own marbles are in the kennel', () => {
    const gs = base_state();
    expect(is_beginning(gs, 0)).toBe(true);
    place(gs, 0, 3, 0);
    expect(is_beginning(gs, 0)).toBe(false);
    expect(is_beginning(gs, 1)).toBe(true);
  });

  it('adds the partner once all own marbles are in the finish lane', () => {
    const gs = base_state();
    gs.active_player_idx = 1;
    expect(movable_player_indices(gs)).toEqual([1]);
    [76, 77, 78, 79].forEach((pos, j) => place(gs, 1, j, pos, true));
    expect(movable_player_indices(gs)).toEqual([1, 3]);
  });
});
