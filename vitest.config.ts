import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    // SDK 运行在 web view 中，测试里用 jsdom 提供 document / CustomEvent
    environment: "jsdom",
    include: ["src/**/*.test.ts"],
    restoreMocks: true,
  },
});
