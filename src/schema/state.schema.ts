import { z } from 'zod';

/**
 * 对局状态的结构校验（只校验形状与取值范围；领域不变量见 engine/validate.ts）。
 */

/** 四种花色；大小王的花色为空串 */
export const SUITS = ['♠', '♥', '♦', '♣'] as const;

/** 点数顺序即 rank-index（用于展示排序，不参与合法性判断） */
export const RANKS = ['2', '3', '4', '5', '6', '7', '8', '9', '10', 'J', 'Q', 'K', 'A', 'JKR'] as const;

export const CardSchema = z.object({
  suit: z.enum(['♠', '♥', '♦', '♣', '']),
  rank: z.enum(RANKS),
});

/**
 * 弹珠：
 * - pos：位置编码（0..63 公共赛道；64+8i.. 狗窝；68+8i.. 终点道）
 * - is_save：安全标记，安全弹珠阻挡任何弹珠经过其所在格
 */
export const MarbleSchema = z.object({
  pos: z.number().int().min(0).max(95),
  is_save: z.boolean(),
});

export const PlayerStateSchema = z.object({
  name: z.string(),
  hand: z.array(CardSchema),
  marbles: z.array(MarbleSchema).length(4, '每位玩家必须有 4 颗弹珠'),
});

const SeatIndex = z.number().int().min(0).max(3);

/**
 * 7 点牌的回滚快照：只保存会被分步移动改动的字段。
 */
export const SevenSnapshotSchema = z.object({
  marbles: z.array(z.array(MarbleSchema)),
  hands: z.array(z.array(CardSchema)),
  active_card: CardSchema.nullable(),
  steps_remaining: z.number().int().nullable(),
  active_player_idx: SeatIndex,
});

export const GameStateSchema = z.object({
  phase: z.enum(['RUNNING', 'FINISHED']),
  /** 轮次号（>=1，只增不减） */
  round: z.number().int().min(1),
  started_player_idx: SeatIndex,
  active_player_idx: SeatIndex,
  players: z.array(PlayerStateSchema).length(4, '对局固定 4 位玩家'),
  /** 牌堆顶 = 数组尾部 */
  draw_pile: z.array(CardSchema),
  discard_pile: z.array(CardSchema),
  /** 大王替代出的牌，或正在分步执行的 7 */
  active_card: CardSchema.nullable(),
  card_exchanged: z.boolean(),
  card_exchange_enabled: z.boolean(),
  exchange_buffer: z.array(CardSchema.nullable()).length(4),
  steps_remaining: z.number().int().min(1).max(7).nullable(),
  seven_snapshot: SevenSnapshotSchema.nullable(),
  winning_team: z.union([z.literal(0), z.literal(1)]).nullable(),
  /** 洗牌 RNG 的内部状态（uint32） */
  rng_state: z.number().int().min(0),
});

/**
 * 动作：pos_from / pos_to / card_swap 均可缺省（交换阶段只有 card）。
 */
export const ActionSchema = z.object({
  card: CardSchema,
  pos_from: z.number().int().optional(),
  pos_to: z.number().int().optional(),
  card_swap: CardSchema.optional(),
});

/** 安全解析对局状态：成功返回 { success:true, data }；失败返回 { success:false, error } */
export function parse_state(input: unknown) {
  return GameStateSchema.safeParse(input);
}

/** 安全解析动作 */
export function parse_action(input: unknown) {
  return ActionSchema.safeParse(input);
}
