/**
 * 自动对局运行器（Auto Runner）
 * 用给定策略批量模拟对局，产出胜队分布、步数、未终局数、
 * 弃牌次数、策略违规次数、按点数的出牌统计与可选事件轨迹。
 */
import type { Action, Event, Logger, TeamIdx } from '../types';
import { mix_seed, mulberry32 } from '../utils/rng.util';
import { action_equals } from './helpers/action.util';
import { card_to_string } from './helpers/card.util';
import { step } from './index';
import { initial_state } from './setup';
import { legal_actions } from './legal_actions';
import type { Strategy } from './strategy';
import { create_random_strategy } from './strategies';
import { player_view } from './view';

/**
 * 自动运行器的配置项
 * - strategies 按席位下标对应；缺省的席位使用按局种子化的随机策略
 */
export interface AutoRunnerOptions {
  episodes: number;
  /** 基础种子；第 ep 局使用 mix_seed(seed, ep) */
  seed?: number;
  /** limit of steps per episode (default 2000) */
  max_steps?: number;
  strategies?: Strategy[];
  /** 每轮开始前是否换牌 */
  card_exchange?: boolean;
  /** when true, collect event trajectory for each episode */
  collect_trajectory?: boolean;
  logger?: Logger;
}

/**
 * 自动运行摘要结果
 */
export interface AutoRunnerSummary {
  episodes: number;
  steps: number;
  /** wins[t]：队伍 t 获胜的局数 */
  wins: [number, number];
  /** episodes that hit max_steps or were aborted without a winner */
  unfinished: number;
  /** null actions applied (fold or aborted seven) */
  folds: number;
  /** strategy threw, picked an action outside the legal list, or the step failed */
  violations: number;
  /** count of executed actions per card rank */
  action_hits: Record<string, number>;
  /** actual step count for each episode */
  episode_steps: number[];
  /** optional trajectory of events for each episode */
  trajectories?: Event[][];
}

/**
 * 基于策略的自动运行器：
 * - 每步通过 legal_actions 枚举候选行动，策略只看到自己席位的 player_view
 * - Strategy 返回 null：作为弃牌 / 放弃 7 执行
 * - Strategy 抛错、选了候选之外的动作、或 step 失败：记 violations 并终止该局
 */
export function auto_runner(opts: AutoRunnerOptions): AutoRunnerSummary {
  const { episodes, seed = 0, max_steps = 2000, strategies, card_exchange, collect_trajectory, logger } = opts;
  const context = logger ? { logger } : undefined;

  // 全局统计
  const wins: [number, number] = [0, 0];
  let steps = 0;
  let unfinished = 0;
  let folds = 0;
  let violations = 0;

  const action_hits: Record<string, number> = {};
  const hit_action = (rank: string) => {
    action_hits[rank] = (action_hits[rank] || 0) + 1;
  };

  // 轨迹与每局步数
  const trajectories: Event[][] = [];
  const episode_steps: number[] = [];

  for (let ep = 0; ep < episodes; ep++) {
    // 每局独立种子，便于单独复现
    const episode_seed = mix_seed(seed, ep);
    let state = initial_state({ seed: episode_seed, options: { card_exchange }, context }).game_state;
    const fallback = create_random_strategy(mulberry32(mix_seed(episode_seed, 1)).next_float);

    const events: Event[] = [];
    if (collect_trajectory) trajectories.push(events);

    let winner: TeamIdx | null = null;
    let ep_steps = 0;
    for (let i = 0; i < max_steps; i++) {
      const player_idx = state.active_player_idx;

      // 1) 列举当前席位的所有合法行动
      const actions = legal_actions(state);

      // 2) 策略决策（只看自己的视角）
      const strat = strategies?.[player_idx] ?? fallback;
      let choice: Action | null;
      try {
        choice = strat.choose(actions, { player_idx, view: player_view(state, player_idx) });
      } catch (e) {
        violations++;
        logger?.debug(`Episode ${ep}: strategy for player ${player_idx} threw: ${String(e)}`);
        break;
      }
      const picked = choice;
      if (picked !== null && !actions.some((a) => action_equals(a, picked))) {
        violations++;
        logger?.debug(`Episode ${ep}: illegal choice ${card_to_string(picked.card)} by player ${player_idx}`);
        break;
      }

      // 3) 推进状态机
      const r = step({ game_state: state, action: picked, context });
      if (!r.ok || !r.next_state || !r.state_hash) {
        violations++;
        logger?.debug(`Episode ${ep}: step failed: ${r.error?.code} ${r.error?.message}`);
        break;
      }

      // 4) 记录命中与步数
      if (picked === null) folds++;
      else hit_action(picked.card.rank);
      state = r.next_state;
      steps++;
      ep_steps++;
      if (collect_trajectory) {
        events.push({ seq: ep_steps, player_idx, action: picked, state_hash: r.state_hash });
      }

      // 5) 终局
      if (r.winner !== undefined && r.winner !== null) {
        winner = r.winner;
        break;
      }
    }

    if (winner === null) unfinished++;
    else wins[winner]++;
    episode_steps.push(ep_steps);
    logger?.info(
      `Episode ${ep}: ${winner === null ? 'no winner' : `team ${winner} wins`} after ${ep_steps} step(s).`,
    );
  }

  return {
    episodes,
    steps,
    wins,
    unfinished,
    folds,
    violations,
    action_hits,
    episode_steps,
    trajectories: collect_trajectory ? trajectories : undefined,
  };
}
