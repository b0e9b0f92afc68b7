/**
 * Built-in providers for code a framework calls by convention rather than
 * by import.
 */

import {
  NO_MATCH,
  matched,
  type ConventionMatch,
  type FrameworkPatternProvider,
  type SymbolShape,
} from "./types.js";

const HTTP_VERBS = new Set(["GET", "POST", "PUT", "PATCH", "DELETE", "HEAD", "OPTIONS"]);

const NEXT_DATA_EXPORTS = new Set([
  "getServerSideProps",
  "getStaticProps",
  "getStaticPaths",
  "getInitialProps",
  "generateMetadata",
  "generateStaticParams",
  "generateViewport",
  "generateImageMetadata",
  "generateSitemaps",
  "metadata",
  "viewport",
  "middleware",
  "config",
  "reportWebVitals",
]);

const NEXT_SEGMENT_CONFIG = new Set([
  "dynamic",
  "dynamicParams",
  "revalidate",
  "fetchCache",
  "runtime",
  "preferredRegion",
  "maxDuration",
]);

const REACT_LIFECYCLE = new Set([
  "render",
  "componentDidMount",
  "componentDidUpdate",
  "componentWillUnmount",
  "shouldComponentUpdate",
  "getSnapshotBeforeUpdate",
  "componentDidCatch",
  "getDerivedStateFromProps",
  "getDerivedStateFromError",
  "UNSAFE_componentWillMount",
  "UNSAFE_componentWillReceiveProps",
  "UNSAFE_componentWillUpdate",
]);

const TEST_HOOKS = new Set([
  "setup",
  "teardown",
  "globalSetup",
  "globalTeardown",
  "beforeAll",
  "afterAll",
  "beforeEach",
  "afterEach",
]);

function basename(unitPath: string): string {
  return unitPath.slice(unitPath.lastIndexOf("/") + 1);
}

function inDirectory(unitPath: string, names: readonly string[]): boolean {
  const segments = unitPath.split("/").slice(0, -1);
  return segments.some((segment) => names.includes(segment));
}

export const nextjsProvider: FrameworkPatternProvider = {
  name: "nextjs",
  detect: (deps) => deps.has("next"),
  match(symbol: SymbolShape): ConventionMatch {
    if (!symbol.exported || symbol.ownerName !== undefined) return NO_MATCH;
    const file = basename(symbol.unitPath);

    if (/^(middleware|instrumentation)\.[mc]?[jt]s$/.test(file)) {
      return matched(`Next.js ${file.split(".")[0]} export`);
    }
    if (/^next\.config\./.test(file)) return matched("Next.js config");
    if (!inDirectory(symbol.unitPath, ["pages", "app"])) return NO_MATCH;

    if (symbol.defaultExport) return matched("Next.js page/layout default export");
    if (NEXT_DATA_EXPORTS.has(symbol.name)) return matched(`Next.js ${symbol.name}`);
    if (NEXT_SEGMENT_CONFIG.has(symbol.name)) return matched("Next.js route segment config");
    if (HTTP_VERBS.has(symbol.name) && /^route\.[jt]sx?$/.test(file)) {
      return matched(`Next.js ${symbol.name} route handler`);
    }
    return NO_MATCH;
  },
};

export const reactProvider: FrameworkPatternProvider = {
  name: "react",
  detect: (deps) => deps.has("react"),
  match(symbol) {
    if (symbol.kind === "method" && symbol.ownerName !== undefined && REACT_LIFECYCLE.has(symbol.name)) {
      return matched(`React lifecycle method ${symbol.name}`);
    }
    return NO_MATCH;
  },
};

export const expressProvider: FrameworkPatternProvider = {
  name: "express",
  detect: (deps) => deps.has("express"),
  match(symbol) {
    if (!symbol.exported || symbol.ownerName !== undefined) return NO_MATCH;
    if (symbol.kind !== "function" && symbol.kind !== "variable") return NO_MATCH;
    if (inDirectory(symbol.unitPath, ["routes", "controllers", "middleware", "middlewares"])) {
      return matched("Express route or middleware module");
    }
    if (/^(app|server)\.[mc]?[jt]s$/.test(basename(symbol.unitPath))) {
      return matched("Express application module");
    }
    return NO_MATCH;
  },
};

function testRunnerProvider(name: string, packages: readonly string[], configPrefix: string): FrameworkPatternProvider {
  const configFile = new RegExp(`^${configPrefix}\\.(config|setup|workspace)\\.[mc]?[jt]s$`);
  return {
    name,
    detect: (deps) => packages.some((pkg) => deps.has(pkg)),
    match(symbol) {
      if (!symbol.exported || symbol.ownerName !== undefined) return NO_MATCH;
      const file = basename(symbol.unitPath);
      if (symbol.defaultExport && configFile.test(file)) return matched(`${name} configuration`);
      if (/setup|teardown/i.test(file) && (symbol.defaultExport || TEST_HOOKS.has(symbol.name))) {
        return matched(`${name} setup file`);
      }
      if (TEST_HOOKS.has(symbol.name)) return matched(`${name} ${symbol.name} hook`);
      return NO_MATCH;
    },
  };
}

export const jestProvider = testRunnerProvider("jest", ["jest", "@jest/core"], "jest");
export const vitestProvider = testRunnerProvider("vitest", ["vitest"], "vitest");

export const BUILTIN_PROVIDERS: readonly FrameworkPatternProvider[] = [
  nextjsProvider,
  reactProvider,
  expressProvider,
  jestProvider,
  vitestProvider,
];
