import { DEFAULT_OPTIONS, TEST_PAGE_LIMIT } from "./constants";
import { logger } from "./logger";
import type { CrawlOptions } from "./types";
import { parseNonNegativeInt, parsePositiveInt } from "./utils";

export interface ParseResult {
  options: CrawlOptions;
  showHelp: boolean;
  showVersion: boolean;
}

export function printHelp(): void {
  const lines = [
    "Usage:",
    "  docbinder [crawl] <url> [options]   crawl the docs under <url>, then compile",
    "  docbinder compile [options]         compile an existing output directory",
    "",
    "Options:",
    "  --test                 Bounded mode: stop after 5 pages",
    `  --maxPages <n>         Cap on pages claimed across the whole crawl`,
    `  --maxDepth <n>         Max link depth from the start page (default ${DEFAULT_OPTIONS.maxDepth})`,
    `  --delay <ms>           Minimum interval between requests (default ${DEFAULT_OPTIONS.delayMs})`,
    `  --concurrency <n>      Pages fetched in parallel (default ${DEFAULT_OPTIONS.concurrency})`,
    `  --timeout <ms>         Per-request timeout (default ${DEFAULT_OPTIONS.timeoutMs})`,
    `  --retries <n>          Retries for transient failures (default ${DEFAULT_OPTIONS.retries})`,
    `  --locale <tag>         Locale segment links must contain (default ${DEFAULT_OPTIONS.locale ?? "none"})`,
    "  --any-locale           Follow links in every locale",
    "  --external <segment>   Path segment kept as an external link (repeatable)",
    `  --outDir <path>        Output directory (default ${DEFAULT_OPTIONS.outDir})`,
    "  --userAgent <string>   Custom User-Agent header",
    "  --no-compile           Crawl only, skip the compiled document",
    "  --no-progress          Disable the progress bar",
    "  --verbose              Verbose logging",
    "  --version              Print the version",
    "  --help                 Show this help",
    "",
    "Examples:",
    "  docbinder https://developer.mozilla.org/en-US/docs/Web/CSS --test",
    "  docbinder compile --outDir output",
  ];
  console.info(lines.join("\n"));
}

export function parseArgs(args: string[]): ParseResult {
  const opts: CrawlOptions = {
    ...DEFAULT_OPTIONS,
    externalSections: [...DEFAULT_OPTIONS.externalSections],
  };

  const iterator = args[Symbol.iterator]();
  const positionalArgs: string[] = [];
  const externalSections: string[] = [];
  let showHelp = false;
  let showVersion = false;
  let testMode = false;

  const consumeNext = (valueFromEq: string | undefined): string | undefined => {
    if (valueFromEq) {
      return valueFromEq;
    }
    const next = iterator.next();
    return next.done ? undefined : next.value;
  };

  const handlers: Record<string, (valueFromEq: string | undefined) => void> = {
    "--outDir": (valueFromEq) => {
      opts.outDir = consumeNext(valueFromEq) ?? DEFAULT_OPTIONS.outDir;
    },
    "--concurrency": (valueFromEq) => {
      const raw = consumeNext(valueFromEq);
      opts.concurrency = parsePositiveInt(raw, DEFAULT_OPTIONS.concurrency);
    },
    "--delay": (valueFromEq) => {
      const raw = consumeNext(valueFromEq);
      opts.delayMs = parsePositiveInt(raw, DEFAULT_OPTIONS.delayMs);
    },
    "--timeout": (valueFromEq) => {
      const raw = consumeNext(valueFromEq);
      opts.timeoutMs = parsePositiveInt(raw, DEFAULT_OPTIONS.timeoutMs);
    },
    "--retries": (valueFromEq) => {
      const raw = consumeNext(valueFromEq);
      opts.retries = parseNonNegativeInt(raw, DEFAULT_OPTIONS.retries);
    },
    "--maxDepth": (valueFromEq) => {
      const raw = consumeNext(valueFromEq);
      opts.maxDepth = parseNonNegativeInt(raw, DEFAULT_OPTIONS.maxDepth);
    },
    "--maxPages": (valueFromEq) => {
      const raw = consumeNext(valueFromEq);
      const value = parsePositiveInt(raw, 0);
      opts.maxPages = value > 0 ? value : undefined;
    },
    "--test": () => {
      testMode = true;
    },
    "--locale": (valueFromEq) => {
      opts.locale = consumeNext(valueFromEq) ?? DEFAULT_OPTIONS.locale;
    },
    "--any-locale": () => {
      opts.locale = null;
    },
    "--external": (valueFromEq) => {
      const segment = consumeNext(valueFromEq);
      if (segment) {
        externalSections.push(segment);
      }
    },
    "--userAgent": (valueFromEq) => {
      opts.userAgent = consumeNext(valueFromEq) ?? DEFAULT_OPTIONS.userAgent;
    },
    "--no-compile": () => {
      opts.compile = false;
    },
    "--no-progress": () => {
      opts.progress = false;
    },
    "--verbose": () => {
      opts.verbose = true;
    },
    "--version": () => {
      showVersion = true;
    },
    "--help": () => {
      showHelp = true;
    },
  };

  for (const arg of iterator) {
    const [flag = "", valueFromEq] = arg.split("=", 2);
    const handler = handlers[flag];
    if (handler) {
      handler(valueFromEq);
    } else {
      positionalArgs.push(arg);
    }
  }

  if (externalSections.length > 0) {
    opts.externalSections = externalSections;
  }
  if (testMode && opts.maxPages === undefined) {
    opts.maxPages = TEST_PAGE_LIMIT;
  }

  const warnExtraArgs = (extras: string[]): void => {
    if (extras.length === 0) {
      return;
    }
    logger.warn(`Ignoring extra positional arguments: ${extras.join(", ")}`);
  };

  const ensureValidUrl = (value: string): string => {
    try {
      new URL(value);
      return value;
    } catch {
      throw new Error(
        `"${value}" is not a valid URL. Provide a start URL or "compile"`
      );
    }
  };

  const [first, ...rest] = positionalArgs;
  if (first === undefined) {
    showHelp = showHelp || !showVersion;
    return { options: opts, showHelp, showVersion };
  }

  const keyword = first.toLowerCase();
  if (keyword === "compile") {
    opts.command = "compile";
    warnExtraArgs(rest);
  } else if (keyword === "crawl") {
    const target = rest[0];
    if (!target) {
      throw new Error(
        'Provide a start URL after "crawl" (e.g. crawl https://example.com/docs)'
      );
    }
    opts.startUrl = ensureValidUrl(target);
    warnExtraArgs(rest.slice(1));
  } else {
    opts.startUrl = ensureValidUrl(first);
    warnExtraArgs(rest);
  }

  return { options: opts, showHelp, showVersion };
}
