import type { Strategy } from '../strategy';

/** 均匀随机；随机源可注入（() => [0, 1)），便于复现 */
export function create_random_strategy(random: () => number = Math.random): Strategy {
  return {
    choose(actions) {
      if (actions.length === 0) return null;
      const idx = Math.floor(random() * actions.length);
      return actions[idx];
    },
  };
}

export const random_strategy: Strategy = create_random_strategy();
