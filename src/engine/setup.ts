import { format_issues, parse_game_options } from '../schema';
import type { GameState, InitialStateInput, InitialStateOutput } from '../types';
import { hash_state } from '../utils/canonical.util';
import { DogEngineError } from './errors';
import { build_deck } from './helpers/card.util';
import { kennel_start, MARBLES_PER_PLAYER } from './helpers/board.util';
import { cards_for_round, deal_cards } from './effects/deal';
import { shuffle_cards } from './effects/shuffle';
import { validate_state } from './validate';

/**
 * initial_state()
 * ----------------
 * 根据 seed + options 构造首个对局状态：洗好的整副牌、全部弹珠在狗窝、第 1 轮每人 6 张。
 *  - 纯函数：不做 IO；只由入参决定出参。
 *  - 确定性：洗牌只依赖 seed（mulberry32），RNG 状态保存在 rng_state 里，后续重洗可复现。
 */
export function initial_state(input: InitialStateInput = {}): InitialStateOutput {
  const parsed = parse_game_options(input.options);
  if (!parsed.success) {
    throw new DogEngineError('INVALID_OPTIONS', format_issues(parsed.error.issues), parsed.error.issues);
  }
  const options = parsed.data;
  const seed = input.seed ?? options.seed;

  const game_state: GameState = {
    phase: 'RUNNING',
    round: 1,
    started_player_idx: 0,
    active_player_idx: 0,
    players: options.player_names.map((name, i) => ({
      name,
      hand: [],
      marbles: Array.from({ length: MARBLES_PER_PLAYER }, (_, j) => ({
        pos: kennel_start(i) + j,
        is_save: false,
      })),
    })),
    draw_pile: [],
    discard_pile: [],
    active_card: null,
    card_exchanged: false,
    card_exchange_enabled: options.card_exchange,
    exchange_buffer: [null, null, null, null],
    steps_remaining: null,
    seven_snapshot: null,
    winning_team: null,
    // uint32 规范化
    rng_state: seed >>> 0,
  };

  game_state.draw_pile = shuffle_cards(game_state, build_deck());
  deal_cards(game_state, cards_for_round(game_state.round));

  const v = validate_state(game_state);
  if (v.errors.length) {
    // 初始化就坏了：说明引擎本身有问题
    throw new Error(`INVARIANT_FAILED_AT_INIT: ${JSON.stringify(v.errors)}`);
  }
  input.context?.logger?.info(`New game (seed ${seed}), round 1 dealt.`);

  return { game_state, state_hash: hash_state(game_state) };
}
