import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import { defineConfig } from "tsup";

type PackageJson = {
  dependencies?: Record<string, string>;
};

type TsupConfigInput = {
  entry: string[];
  // keep runtime dependencies out of the bundle
  externalizeDeps?: boolean;
  // workspace packages point at TS sources, so they are always bundled in
  noExternal?: RegExp[];
};

const readDependencies = (): string[] => {
  const raw = readFileSync(resolve(process.cwd(), "package.json"), "utf-8");
  const pkg: PackageJson = JSON.parse(raw);
  return Object.keys(pkg.dependencies ?? {}).filter((name) => !name.startsWith("@pipeline-dispatch/"));
};

export const createNodeConfig = ({ entry, externalizeDeps = false, noExternal }: TsupConfigInput) =>
  defineConfig({
    entry,
    format: ["esm"],
    target: "node20",
    platform: "node",
    sourcemap: true,
    clean: true,
    outDir: "dist",
    external: externalizeDeps ? readDependencies() : undefined,
    noExternal,
  });
