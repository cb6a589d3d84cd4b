/**
 * The browser operations the dispatcher needs from a live session.
 *
 * SeleniumDriver implements this over selenium-webdriver; tests use an
 * in-process fake.
 */

export const BROWSER_KINDS = ['chrome', 'firefox', 'edge'] as const;
export type BrowserKind = (typeof BROWSER_KINDS)[number];

export const LOCATOR_STRATEGIES = ['id', 'css', 'xpath', 'name', 'tag', 'class'] as const;
export type LocatorStrategy = (typeof LOCATOR_STRATEGIES)[number];

export interface LaunchOptions {
  headless?: boolean;
  arguments?: string[];
  window_size?: { width: number; height: number };
}

export interface ElementQuery {
  by: LocatorStrategy;
  value: string;
  timeoutMs: number;
}

/** How far an element must get before a lookup succeeds. */
export type ElementState = 'present' | 'visible' | 'clickable';

export interface ElementSummary {
  tag: string;
  text: string;
  displayed: boolean;
  enabled: boolean;
}

export interface PageInfoRequest {
  title: boolean;
  url: boolean;
  source: boolean;
}

export interface PageInfo {
  title?: string;
  url?: string;
  source?: string;
}

export interface BrowserDriver {
  /** Resolves with the URL the browser ended up on. */
  navigate(url: string, options: { waitForLoad: boolean; timeoutMs: number }): Promise<string>;
  title(): Promise<string>;
  pageInfo(request: PageInfoRequest): Promise<PageInfo>;
  findElement(query: ElementQuery, state: ElementState): Promise<ElementSummary>;
  click(query: ElementQuery, options: { force: boolean }): Promise<void>;
  sendKeys(query: ElementQuery, text: string, options: { clearFirst: boolean; typeDelayMs: number }): Promise<void>;
  getText(query: ElementQuery): Promise<string>;
  hover(query: ElementQuery): Promise<void>;
  doubleClick(query: ElementQuery): Promise<void>;
  rightClick(query: ElementQuery): Promise<void>;
  dragAndDrop(source: ElementQuery, target: ElementQuery): Promise<void>;
  /** `key` is already translated to what WebDriver expects. */
  pressKey(key: string): Promise<void>;
  executeScript(script: string, args: unknown[]): Promise<unknown>;
  uploadFile(query: ElementQuery, filePath: string): Promise<void>;
  /** PNG bytes. */
  screenshot(options: { fullPage: boolean }): Promise<Buffer>;
  quit(): Promise<void>;
}

export type DriverFactory = (kind: BrowserKind, options: LaunchOptions) => Promise<BrowserDriver>;

export function isBrowserKind(value: string): value is BrowserKind {
  return BROWSER_KINDS.some((kind) => kind === value);
}
