export {
  DogGame,
  initial_state,
  step,
  legal_actions,
  apply_action,
  check_victory,
  player_view,
  validate_state,
  DogEngineError,
  is_engine_error,
  first_strategy,
  random_strategy,
  create_random_strategy,
} from './engine';
export type { DogErrorCode, Strategy, StrategyContext } from './engine';
export { auto_runner } from './engine/auto_runner';
export type { AutoRunnerOptions, AutoRunnerSummary } from './engine/auto_runner';
export { cards_for_round } from './engine/effects/deal';
export { build_deck, DECK_SIZE } from './engine/helpers/card.util';
export { GameStateSchema, ActionSchema, GameOptionsSchema, parse_state, parse_action } from './schema';
export type * from './types';
