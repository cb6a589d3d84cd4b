import { By, Key } from 'selenium-webdriver';
import type { BrowserKind, ElementQuery, LaunchOptions, LocatorStrategy } from './driver.js';
import { ToolError } from './errors.js';

/**
 * Translate a locator strategy name into a Selenium `By`.
 */
export function toBy(strategy: LocatorStrategy, value: string): By {
  switch (strategy) {
    case 'id':
      return By.id(value);
    case 'css':
      return By.css(value);
    case 'xpath':
      return By.xpath(value);
    case 'name':
      return By.name(value);
    case 'tag':
      // A bare tag name is a valid CSS selector.
      return By.css(value);
    case 'class':
      return By.className(value);
  }
}

export function describeQuery(query: Pick<ElementQuery, 'by' | 'value'>): string {
  return `${query.by}=${query.value}`;
}

// Keys are matched after lowercasing and dropping spaces, dashes and underscores.
const NAMED_KEYS: Record<string, string> = {
  enter: Key.ENTER,
  return: Key.RETURN,
  tab: Key.TAB,
  escape: Key.ESCAPE,
  esc: Key.ESCAPE,
  backspace: Key.BACK_SPACE,
  delete: Key.DELETE,
  del: Key.DELETE,
  insert: Key.INSERT,
  space: Key.SPACE,
  arrowup: Key.ARROW_UP,
  up: Key.ARROW_UP,
  arrowdown: Key.ARROW_DOWN,
  down: Key.ARROW_DOWN,
  arrowleft: Key.ARROW_LEFT,
  left: Key.ARROW_LEFT,
  arrowright: Key.ARROW_RIGHT,
  right: Key.ARROW_RIGHT,
  home: Key.HOME,
  end: Key.END,
  pageup: Key.PAGE_UP,
  pagedown: Key.PAGE_DOWN,
  shift: Key.SHIFT,
  control: Key.CONTROL,
  ctrl: Key.CONTROL,
  alt: Key.ALT,
  meta: Key.META,
  command: Key.META,
  cmd: Key.META,
  f1: Key.F1,
  f2: Key.F2,
  f3: Key.F3,
  f4: Key.F4,
  f5: Key.F5,
  f6: Key.F6,
  f7: Key.F7,
  f8: Key.F8,
  f9: Key.F9,
  f10: Key.F10,
  f11: Key.F11,
  f12: Key.F12,
};

/**
 * Resolve a key name such as "Enter", "page_down" or "F5" to the WebDriver
 * key code. Single characters are sent as they are.
 */
export function resolveKey(name: string): string {
  if ([...name].length === 1) return name;
  const normalized = name.toLowerCase().replace(/[\s_-]/g, '');
  if (!Object.hasOwn(NAMED_KEYS, normalized)) {
    throw new ToolError('InvalidArguments', `Unknown key: ${name}`, [
      'key: expected a single character or a named key such as Enter, Tab, Escape, ArrowDown or F5',
    ]);
  }
  return NAMED_KEYS[normalized];
}

/**
 * Command-line switches for the requested browser, in the order the driver
 * receives them: headless flag, caller arguments, window size.
 */
export function browserArguments(kind: BrowserKind, options: LaunchOptions): string[] {
  const args: string[] = [];
  const size = options.window_size;

  if (kind === 'firefox') {
    if (options.headless) args.push('--headless');
    args.push(...(options.arguments ?? []));
    if (size) args.push(`--width=${size.width}`, `--height=${size.height}`);
    return args;
  }

  if (options.headless) args.push('--headless=new');
  args.push(...(options.arguments ?? []));
  if (size) args.push(`--window-size=${size.width},${size.height}`);
  return args;
}
