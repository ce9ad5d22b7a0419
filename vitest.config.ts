import { transformWithEsbuild } from "vite";
import { defineConfig } from "vitest/config";

export default defineConfig({
  // Vite's built-in esbuild step forces `keepNames: false`, and esbuild renames
  // function expressions that shadow an enclosing binding (`half` -> `half2`).
  // The code under test reports `fn.name`, so transform TypeScript with
  // `keepNames` enabled instead.
  esbuild: false,
  plugins: [
    {
      name: "ts-keep-names",
      enforce: "pre",
      async transform(code, id) {
        const file = id.split("?")[0];
        if (!/\.(m?ts|tsx)$/.test(file)) return null;
        const result = await transformWithEsbuild(code, file, {
          target: "esnext",
          keepNames: true,
          sourcemap: true,
        });
        return { code: result.code, map: JSON.stringify(result.map) };
      },
    },
  ],
  test: {
    include: ["packages/**/*.test.ts"],
    environment: "node",
  },
});
