import { z } from 'zod';

/**
 * 开局参数：
 * - seed：洗牌种子（uint32 语义，实现用 >>> 0 规整）
 * - card_exchange：每轮开始前是否先进行队友换牌
 * - player_names：4 个席位的显示名
 */
export const GameOptionsSchema = z.object({
  seed: z.number().int().default(0),
  card_exchange: z.boolean().default(false),
  player_names: z
    .array(z.string().min(1, '玩家名不能为空'))
    .length(4, '必须给出 4 个玩家名')
    .default(['Player 1', 'Player 2', 'Player 3', 'Player 4']),
});

/**
 * CLI 参数（commander 解析出的原始字符串在这里做数值化与范围检查）
 */
export const SimOptionsSchema = z.object({
  episodes: z.coerce.number().int().min(1, 'episodes 至少为 1'),
  seed: z.coerce.number().int(),
  max_steps: z.coerce.number().int().min(1, 'max-steps 至少为 1'),
  exchange: z.boolean(),
});

/** 安全解析开局参数（缺省字段取默认值） */
export function parse_game_options(input: unknown) {
  return GameOptionsSchema.safeParse(input ?? {});
}
