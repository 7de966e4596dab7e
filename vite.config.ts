import { defineConfig } from "vite";
import { URL, fileURLToPath } from "node:url";

const resolveFromRoot = (relativePath: string) =>
    fileURLToPath(new URL(relativePath, import.meta.url));

export default defineConfig({
    appType: "spa",
    build: {
        outDir: "dist",
        sourcemap: true
    },
    resolve: {
        alias: {
            "app": resolveFromRoot("./src/app"),
            "physics": resolveFromRoot("./src/physics"),
            "render": resolveFromRoot("./src/render"),
            "util": resolveFromRoot("./src/util"),
            "cli": resolveFromRoot("./src/cli"),
            "input": resolveFromRoot("./src/input"),
            "storage": resolveFromRoot("./src/storage"),
            "config": resolveFromRoot("./src/config")
        }
    },
    server: {
        port: 5173,
        strictPort: true
    }
});
