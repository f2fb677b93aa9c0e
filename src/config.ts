type BrowserType = 'chromium' | 'firefox' | 'webkit';

function env(key: string, fallback: string): string {
  return process.env[key] ?? fallback;
}

function envInt(key: string, fallback: number): number {
  const raw = process.env[key];
  if (raw === undefined) return fallback;
  const parsed = Number.parseInt(raw, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

function envBool(key: string, fallback: boolean): boolean {
  const raw = process.env[key];
  if (raw === undefined) return fallback;
  return raw === 'true' || raw === '1';
}

function envList(key: string, fallback: string[]): string[] {
  const raw = process.env[key];
  if (raw === undefined || raw.trim() === '') return fallback;
  return raw
    .split(',')
    .map((s) => s.trim().toLowerCase())
    .filter(Boolean);
}

function envBrowser(key: string, fallback: BrowserType): BrowserType {
  const raw = process.env[key];
  if (raw === 'chromium' || raw === 'firefox' || raw === 'webkit') return raw;
  return fallback;
}

export const config = {
  headless: envBool('WEBPILOT_HEADLESS', false),
  browser: envBrowser('WEBPILOT_BROWSER', 'chromium'),
  viewportWidth: envInt('WEBPILOT_VIEWPORT_WIDTH', 1920),
  viewportHeight: envInt('WEBPILOT_VIEWPORT_HEIGHT', 1080),
  // Clicks on targets containing one of these get a longer settle and a network-idle wait.
  navKeywords: envList('WEBPILOT_NAV_KEYWORDS', ['product', 'dashboard', 'menu', 'nav']),
  reportPath: env('WEBPILOT_REPORT_PATH', 'test-report.json'),
  openaiApiKey: process.env.OPENAI_API_KEY,
  model: env('WEBPILOT_MODEL', 'gpt-3.5-turbo'),
  llmMinIntervalMs: envInt('WEBPILOT_LLM_INTERVAL_MS', 2000),
  parseCacheSize: envInt('WEBPILOT_PARSE_CACHE_SIZE', 50),
  timing: {
    navigationTimeoutMs: 30_000,
    navigationRetryDelayMs: 2_000,
    postNavigateSettleMs: 1_000,
    clickTimeoutMs: 10_000,
    clickRetryDelayMs: 1_000,
    postClickSettleMs: 1_000,
    navClickSettleMs: 2_000,
    navClickIdleTimeoutMs: 5_000,
    interActionDelayMs: 1_500,
    maxAttempts: 3,
  },
} as const;

export type Config = typeof config;
