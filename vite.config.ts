import { defineConfig } from "vite";
import { fileURLToPath } from "node:url";
import dts from "vite-plugin-dts"; // 引入 dts 插件

export default defineConfig({
  plugins: [
    dts({
      // 配置 dts 插件
      insertTypesEntry: true, // 在入口处插入类型定义
      exclude: ["src/**/*.test.ts", "src/__tests__/**"],
    }),
  ],
  build: {
    lib: {
      // 构建库的入口文件
      entry: fileURLToPath(new URL("./src/index.ts", import.meta.url)),
      // 暴露的全局变量名称 (当 format 为 'iife' 时)，即 window.NativeBridge
      name: "NativeBridge",
      // 'es' 给打包工具使用，'iife' 适用于 <script> 标签直接引入
      formats: ["es", "iife"],
      fileName: (format) => `native-bridge-sdk.${format}.js`,
    },
    rollupOptions: {
      // nanoid 体积很小，直接打进产物，保证 iife 单文件可用
      external: [],
    },
    // 输出目录 (相对于项目根目录)
    outDir: "dist",
  },
});
