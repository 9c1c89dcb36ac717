import type { EngineError } from '../types';

export * from './state.schema';
export * from './options.schema';

/** 把 zod issues 拼成一条可读消息（错误对象与 CLI 复用） */
export function format_issues(issues: Array<{ path: Array<string | number>; message: string }>): string {
  return issues.map((i) => `/${i.path.join('/')}: ${i.message}`).join('; ');
}

/** 构造统一的引擎错误结构 */
export function engine_error(code: string, message: string, details?: unknown): EngineError {
  return { code, message, details };
}
