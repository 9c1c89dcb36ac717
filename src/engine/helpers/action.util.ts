import type { Action, Card } from '../../types';
import { card_to_string } from './card.util';

/** 结构键：四个字段全部参与，缺省字段记为空 */
export function action_key(action: Action): string {
  return [
    card_to_string(action.card),
    action.pos_from ?? '',
    action.pos_to ?? '',
    action.card_swap ? card_to_string(action.card_swap) : '',
  ].join('|');
}

export function action_equals(a: Action, b: Action): boolean {
  return action_key(a) === action_key(b);
}

/**
 * 去重收集器：按结构键去重，保留首次插入顺序。
 */
export class ActionSet {
  private readonly by_key = new Map<string, Action>();

  add(action: Action): void {
    const key = action_key(action);
    if (!this.by_key.has(key)) this.by_key.set(key, action);
  }

  add_all(actions: Iterable<Action>): void {
    for (const a of actions) this.add(a);
  }

  to_array(): Action[] {
    return [...this.by_key.values()];
  }
}

/** 移动类动作 */
export function move(card: Card, pos_from: number, pos_to: number): Action {
  return { card, pos_from, pos_to };
}
