/**
 * selenium-webdriver backed implementation of the BrowserDriver port.
 *
 * Waiting is left to WebDriver's own `wait` + `until` conditions; nothing
 * here retries.
 */

import { setTimeout as sleep } from 'timers/promises';
import { Browser, Builder, error as wd, until, WebElement, type WebDriver } from 'selenium-webdriver';
import chrome from 'selenium-webdriver/chrome.js';
import edge from 'selenium-webdriver/edge.js';
import firefox from 'selenium-webdriver/firefox.js';
import remote from 'selenium-webdriver/remote/index.js';
import { z } from 'zod';
import type { ServerConfig } from './config.js';
import type {
  BrowserDriver,
  BrowserKind,
  DriverFactory,
  ElementQuery,
  ElementState,
  ElementSummary,
  LaunchOptions,
  PageInfo,
  PageInfoRequest,
} from './driver.js';
import { ToolError } from './errors.js';
import type { Logger } from './log.js';
import { browserArguments, describeQuery, toBy } from './selenium-utils.js';

const DocumentSize = z.object({ width: z.number(), height: z.number() });

const DOCUMENT_SIZE_SCRIPT = `
  const el = document.documentElement;
  const body = document.body;
  return {
    width: Math.max(el.scrollWidth, body ? body.scrollWidth : 0),
    height: Math.max(el.scrollHeight, body ? body.scrollHeight : 0),
  };
`;

export class SeleniumDriver implements BrowserDriver {
  constructor(private readonly driver: WebDriver) {}

  async navigate(url: string, options: { waitForLoad: boolean; timeoutMs: number }): Promise<string> {
    await this.driver.get(url);
    if (options.waitForLoad) {
      await this.driver.wait(
        async () => (await this.driver.executeScript<unknown>('return document.readyState')) === 'complete',
        options.timeoutMs,
        `Page did not finish loading within ${options.timeoutMs}ms`,
      );
    }
    return this.driver.getCurrentUrl();
  }

  title(): Promise<string> {
    return this.driver.getTitle();
  }

  async pageInfo(request: PageInfoRequest): Promise<PageInfo> {
    const info: PageInfo = {};
    if (request.title) info.title = await this.driver.getTitle();
    if (request.url) info.url = await this.driver.getCurrentUrl();
    if (request.source) info.source = await this.driver.getPageSource();
    return info;
  }

  async findElement(query: ElementQuery, state: ElementState): Promise<ElementSummary> {
    const element = await this.locate(query, state);
    const [tag, text, displayed, enabled] = await Promise.all([
      element.getTagName(),
      element.getText(),
      element.isDisplayed(),
      element.isEnabled(),
    ]);
    return { tag, text, displayed, enabled };
  }

  async click(query: ElementQuery, options: { force: boolean }): Promise<void> {
    const element = await this.locate(query, 'clickable');
    try {
      await element.click();
    } catch (err) {
      if (!(options.force && err instanceof wd.ElementClickInterceptedError)) throw err;
      await this.driver.executeScript('arguments[0].click();', element);
    }
  }

  async sendKeys(
    query: ElementQuery,
    text: string,
    options: { clearFirst: boolean; typeDelayMs: number },
  ): Promise<void> {
    const element = await this.locate(query, 'present');
    if (options.clearFirst) await element.clear();
    if (options.typeDelayMs <= 0) {
      await element.sendKeys(text);
      return;
    }
    for (const char of text) {
      await element.sendKeys(char);
      await sleep(options.typeDelayMs);
    }
  }

  async getText(query: ElementQuery): Promise<string> {
    const element = await this.locate(query, 'present');
    return element.getText();
  }

  async hover(query: ElementQuery): Promise<void> {
    const element = await this.locate(query, 'present');
    await this.driver.actions({ async: true }).move({ origin: element }).perform();
  }

  async doubleClick(query: ElementQuery): Promise<void> {
    const element = await this.locate(query, 'present');
    await this.driver.actions({ async: true }).doubleClick(element).perform();
  }

  async rightClick(query: ElementQuery): Promise<void> {
    const element = await this.locate(query, 'present');
    await this.driver.actions({ async: true }).contextClick(element).perform();
  }

  async dragAndDrop(source: ElementQuery, target: ElementQuery): Promise<void> {
    const from = await this.locate(source, 'present');
    const to = await this.locate(target, 'present');
    await this.driver.actions({ async: true }).dragAndDrop(from, to).perform();
  }

  async pressKey(key: string): Promise<void> {
    await this.driver.actions({ async: true }).keyDown(key).keyUp(key).perform();
  }

  async executeScript(script: string, args: unknown[]): Promise<unknown> {
    return toJsonValue(await this.driver.executeScript<unknown>(script, ...args));
  }

  async uploadFile(query: ElementQuery, filePath: string): Promise<void> {
    const element = await this.locate(query, 'present');
    await element.sendKeys(filePath);
  }

  async screenshot(options: { fullPage: boolean }): Promise<Buffer> {
    if (!options.fullPage) {
      return Buffer.from(await this.driver.takeScreenshot(), 'base64');
    }

    // Grow the window to the document, capture, then put it back.
    const window = this.driver.manage().window();
    const original = await window.getRect();
    const size = DocumentSize.parse(await this.driver.executeScript<unknown>(DOCUMENT_SIZE_SCRIPT));
    await window.setRect({
      width: Math.max(original.width, Math.ceil(size.width)),
      height: Math.max(original.height, Math.ceil(size.height)),
    });
    try {
      return Buffer.from(await this.driver.takeScreenshot(), 'base64');
    } finally {
      await window.setRect({ width: original.width, height: original.height });
    }
  }

  quit(): Promise<void> {
    return this.driver.quit();
  }

  /**
   * Wait for the element, then for the requested state. A lookup that runs
   * out of time is ElementNotFound; a state wait that does is a Timeout.
   */
  private async locate(query: ElementQuery, state: ElementState): Promise<WebElement> {
    const label = describeQuery(query);
    let element: WebElement;
    try {
      element = await this.driver.wait(until.elementLocated(toBy(query.by, query.value)), query.timeoutMs);
    } catch (err) {
      if (err instanceof wd.TimeoutError) {
        throw new ToolError('ElementNotFound', `Element not found within ${query.timeoutMs}ms: ${label}`);
      }
      throw err;
    }

    if (state === 'visible' || state === 'clickable') {
      await this.driver.wait(
        until.elementIsVisible(element),
        query.timeoutMs,
        `Element ${label} not visible within ${query.timeoutMs}ms`,
      );
    }
    if (state === 'clickable') {
      await this.driver.wait(
        until.elementIsEnabled(element),
        query.timeoutMs,
        `Element ${label} not enabled within ${query.timeoutMs}ms`,
      );
    }
    return element;
  }
}

/**
 * Script results as plain JSON: elements become `{ element: id }`, at any
 * depth. Values JSON has no form for (functions, class instances) become
 * their string form.
 */
export async function toJsonValue(value: unknown): Promise<unknown> {
  if (value === undefined || value === null) return null;
  if (value instanceof WebElement) return { element: await value.getId() };
  if (Array.isArray(value)) return Promise.all(value.map((item: unknown) => toJsonValue(item)));
  if (typeof value === 'object') {
    const proto: unknown = Object.getPrototypeOf(value);
    if (proto !== Object.prototype && proto !== null) return String(value);
    const entries = await Promise.all(
      Object.entries(value).map(async ([key, item]): Promise<[string, unknown]> => [key, await toJsonValue(item)]),
    );
    return Object.fromEntries(entries);
  }
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') return value;
  return String(value);
}

/**
 * Applies the page-load timeout and, on a grid, the file detector. A driver
 * that fails here is quit before the error is rethrown.
 */
export async function prepareSession(driver: WebDriver, config: ServerConfig, log: Logger): Promise<void> {
  try {
    await driver.manage().setTimeouts({ pageLoad: config.pageLoadTimeoutMs });
    if (config.remoteUrl) {
      // Ship local files to the grid node for upload_file.
      driver.setFileDetector(new remote.FileDetector());
    }
  } catch (err) {
    await driver.quit().catch((quitErr: unknown) => {
      log.warn('Failed to quit a driver that did not finish setup:', quitErr);
    });
    throw err;
  }
}

const BROWSER_NAMES: Record<BrowserKind, string> = {
  chrome: Browser.CHROME,
  firefox: Browser.FIREFOX,
  edge: Browser.EDGE,
};

/**
 * Builds real WebDriver sessions, locally through Selenium Manager or on a
 * Selenium Grid when `remoteUrl` is configured.
 */
export function createSeleniumDriverFactory(config: ServerConfig, log: Logger): DriverFactory {
  return async (kind: BrowserKind, options: LaunchOptions) => {
    const args = browserArguments(kind, options);
    const builder = new Builder().forBrowser(BROWSER_NAMES[kind]);

    switch (kind) {
      case 'chrome': {
        const chromeOptions = new chrome.Options();
        chromeOptions.addArguments(...args);
        builder.setChromeOptions(chromeOptions);
        break;
      }
      case 'firefox': {
        const firefoxOptions = new firefox.Options();
        firefoxOptions.addArguments(...args);
        builder.setFirefoxOptions(firefoxOptions);
        break;
      }
      case 'edge': {
        const edgeOptions = new edge.Options();
        edgeOptions.addArguments(...args);
        builder.setEdgeOptions(edgeOptions);
        break;
      }
    }

    if (config.remoteUrl) {
      builder.usingServer(config.remoteUrl);
    }

    log.debug(`Starting ${kind} with arguments`, args);
    const driver = await builder.build();
    await prepareSession(driver, config, log);
    log.info(`Started ${kind}${config.remoteUrl ? ` on ${config.remoteUrl}` : ''}`);
    return new SeleniumDriver(driver);
  };
}
