import { defineConfig } from "vite";
import { resolve, dirname } from "path";
import { fileURLToPath } from "url";
import dts from "vite-plugin-dts";

const __dirname = dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  plugins: [dts({ rollupTypes: true })],  // TypeScript 선언 파일 생성
  build: {
    lib: {
      entry: resolve(__dirname, "src/index.ts"),
      name: "ProgressHudCore",
      formats: ["es", "cjs"],
      fileName: (format) => `index.${format === "es" ? "js" : "cjs"}`,
    },
    sourcemap: true,
    minify: false,
  },
});
