import type { GameState, ReduceContext, TeamIdx } from '../types';
import { is_player_finished, partner_of } from './helpers/board.util';

const TEAMS: readonly TeamIdx[] = [0, 1];

/**
 * 胜负判定：某队两位玩家的 8 颗弹珠全部进入各自终点道即获胜。
 * 首次命中时写入 phase = FINISHED 与 winning_team 并返回队伍号；之后调用一律返回 null。
 */
export function check_victory(state: GameState, ctx?: ReduceContext): TeamIdx | null {
  if (state.phase === 'FINISHED') return null;

  for (const team of TEAMS) {
    if (is_player_finished(state, team) && is_player_finished(state, partner_of(team))) {
      state.phase = 'FINISHED';
      state.winning_team = team;
      ctx?.logger?.info(`Team ${team} wins in round ${state.round}.`);
      return team;
    }
  }
  return null;
}
