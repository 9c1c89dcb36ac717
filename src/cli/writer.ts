import { mkdir, writeFile } from "node:fs/promises";
import { dirname, join } from "node:path";

/** 生成一个“写入器”：接收字符串和文件名，落到 baseDir 下；若是 JSON 字符串则按 spaces 重新缩进 */
export function create_folder_writer(baseDir: string, spaces = 2) {
  return async (content: string, filename: string): Promise<string> => {
    const target = join(baseDir, filename);
    await mkdir(dirname(target), { recursive: true });

    // 合法 JSON → 统一格式化；否则原样写入；都保证末尾换行
    let text: string;
    try {
      text = JSON.stringify(JSON.parse(content), null, spaces);
    } catch {
      text = content;
    }
    if (!text.endsWith("\n")) text += "\n";

    await writeFile(target, text, "utf8");
    return target;
  };
}

export type OutputOptions = {
  pretty?: string | boolean;
  minify?: boolean;
};

/** --minify 优先；--pretty 不带值为 2；非法值回退到 2 */
export function to_pretty_spaces(opt: OutputOptions): number {
  if (opt.minify) return 0;
  if (opt.pretty === false) return 0;
  if (opt.pretty === true || opt.pretty === undefined) return 2;
  const n = Number(opt.pretty);
  return Number.isFinite(n) && n >= 0 ? Math.floor(n) : 2;
}
