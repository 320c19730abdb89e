/// <reference types="vitest/config" />
import { defineConfig, type Plugin } from "vite";
import react from "@vitejs/plugin-react";

const isTest = process.env.NODE_ENV === "test" || Boolean(process.env.VITEST);

const summarizeDevPlugin = (): Plugin => ({
  name: "summarize-paper-dev-endpoint",
  configureServer(server) {
    server.middlewares.use("/api/summarize-paper", async (req, res) => {
      try {
        const module = await import("./api/summarize-paper");
        await module.default(req, res);
      } catch (error) {
        console.error("[summarize-paper] dev handler error", error);
        res.statusCode = 500;
        res.end(
          JSON.stringify({
            ok: false,
            error: "Dev handler error",
            requestId: "dev"
          })
        );
      }
    });
  }
});

export default defineConfig(({ mode }) => {
  const baseConfig = {
    test: {
      environment: "jsdom",
      globals: true,
      setupFiles: "./src/tests/setup.ts",
      include: ["src/tests/**/*.test.{ts,tsx}"]
    }
  };

  if (isTest || mode === "test") {
    return {
      ...baseConfig,
      plugins: [react()]
    };
  }

  return {
    ...baseConfig,
    plugins: [react(), summarizeDevPlugin()]
  };
});
