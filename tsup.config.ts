import { defineConfig } from 'tsup';

export default defineConfig({
  entry: {
    index: 'src/index.ts',
    cli: 'src/cli/index.ts',
  },
  dts: { entry: 'src/index.ts' }, // 只为库入口生成类型声明
  sourcemap: true,
  clean: true, // 构建前清理 dist
  format: ['esm', 'cjs'],
  target: 'node20',
  treeshake: true,
  minify: false,
  outDir: 'dist',
  outExtension({ format }) {
    // 与 package.json 对齐：index.mjs / index.cjs
    return { js: format === 'cjs' ? '.cjs' : '.mjs' };
  },
});
