#!/usr/bin/env node
import { Command } from "commander";
import { resolve } from "node:path";
import { auto_runner } from "../engine";
import { format_issues, SimOptionsSchema } from "../schema";
import { create_folder_writer, to_pretty_spaces, type OutputOptions } from "./writer";

type CliOptions = OutputOptions & {
  episodes: string;
  seed: string;
  maxSteps: string;
  exchange?: boolean;
  out?: string; // 可选：输出文件（相对当前目录）；缺省打印到 stdout
  verbose?: boolean;
};

const program = new Command();

program
  .name("dog-sim")
  .description("Simulate Dog games with random players and print a summary")
  .version("0.1.0")
  .option("-e, --episodes <n>", "number of games to simulate", "10")
  .option("-s, --seed <n>", "base seed for shuffling and random players", "0")
  .option("--max-steps <n>", "step limit per game", "2000")
  .option("--exchange", "open every round with the partner card exchange", false)
  .option("--pretty [n]", "pretty-print JSON with n spaces (default: 2)", false)
  .option("--minify", "minify JSON (overrides --pretty)", false)
  .option("-o, --out <file>", "write the summary to a file instead of stdout")
  .option("-v, --verbose", "log rounds and moves to the console", false)
  .action(async (opts: CliOptions) => {
    const spaces = to_pretty_spaces(opts);

    /***
     * 步骤: 参数校验
     * *****
     */
    const parsed = SimOptionsSchema.safeParse({
      episodes: opts.episodes,
      seed: opts.seed,
      max_steps: opts.maxSteps,
      exchange: opts.exchange === true,
    });
    if (!parsed.success) {
      console.error(`❌ Invalid options: ${format_issues(parsed.error.issues)}`);
      process.exitCode = 1;
      return;
    }
    const sim = parsed.data;

    /***
     * 步骤: 模拟
     * *****
     */
    try {
      const summary = auto_runner({
        episodes: sim.episodes,
        seed: sim.seed,
        max_steps: sim.max_steps,
        card_exchange: sim.exchange,
        logger: opts.verbose ? console : undefined,
      });
      const text = JSON.stringify(summary, null, spaces);

      if (!opts.out) {
        console.log(text);
        return;
      }
      const wtf = create_folder_writer(resolve("."), spaces);
      const target = await wtf(text, opts.out);
      console.log(`✅ Summary written to: ${target}`);
    } catch (err) {
      console.error(`💥 Unexpected error: ${err instanceof Error ? err.message : String(err)}`);
      process.exitCode = 1;
    }
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error(`💥 ${err instanceof Error ? err.message : String(err)}`);
  process.exitCode = 1;
});
