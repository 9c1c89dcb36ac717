import type { z } from 'zod';
import type {
  ActionSchema,
  CardSchema,
  GameStateSchema,
  MarbleSchema,
  PlayerStateSchema,
  SevenSnapshotSchema,
} from '../schema';

export type Card = z.infer<typeof CardSchema>;
export type Suit = Card['suit'];
export type Rank = Card['rank'];

export type Marble = z.infer<typeof MarbleSchema>;
export type PlayerState = z.infer<typeof PlayerStateSchema>;
export type SevenSnapshot = z.infer<typeof SevenSnapshotSchema>;
export type GameState = z.infer<typeof GameStateSchema>;
export type GamePhase = GameState['phase'];

// 动作：card 必填；交换阶段只带 card，大王替代带 card_swap，移动带 pos_from/pos_to
export type Action = z.infer<typeof ActionSchema>;

// 队伍：席位 i 与 i+2 同队，队伍号 = i % 2
export type TeamIdx = 0 | 1;

// 错误
export interface EngineError { code: string; message: string; details?: unknown }
