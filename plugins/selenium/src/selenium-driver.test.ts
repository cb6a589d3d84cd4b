import { describe, it, expect, vi } from 'vitest';
import { error as wd, Session, WebDriver, WebElement } from 'selenium-webdriver';
import { DEFAULT_CONFIG } from './config.js';
import { ToolError } from './errors.js';
import { createLogger, silentLogger } from './log.js';
import { prepareSession, SeleniumDriver, toJsonValue } from './selenium-driver.js';

const ELEMENT_KEY = 'element-6066-11e4-a52e-4f735466cecf';

interface WireCommand {
  getName(): string;
  getParameter(key: string): unknown;
}

type Handler = (command: WireCommand) => unknown;

/**
 * A real WebDriver whose commands are answered in process, by command name.
 * Commands without a handler fail.
 */
function fakeWebDriver(handlers: Partial<Record<string, Handler>>) {
  const commands: WireCommand[] = [];
  const executor = {
    execute: vi.fn(async (command: WireCommand) => {
      commands.push(command);
      const handler = handlers[command.getName()];
      if (!handler) throw new wd.UnsupportedOperationError(`No handler for ${command.getName()}`);
      return handler(command);
    }),
  };
  const driver = new WebDriver(new Session('session-test', {}), executor);
  const named = (name: string) => commands.filter((command) => command.getName() === name);
  return { driver, commands, named };
}

const found = (id: string) => () => [{ [ELEMENT_KEY]: id }];

/** An element that is there, shown and enabled. */
const READY_ELEMENT: Partial<Record<string, Handler>> = {
  findElements: found('el-1'),
  isElementDisplayed: () => true,
  isElementEnabled: () => true,
};

describe('SeleniumDriver', () => {
  describe('element lookup', () => {
    it('reports a lookup that runs out of time as ElementNotFound', async () => {
      const { driver } = fakeWebDriver({ findElements: () => [] });
      const browser = new SeleniumDriver(driver);

      const lookup = browser.getText({ by: 'css', value: '#missing', timeoutMs: 30 });
      await expect(lookup).rejects.toBeInstanceOf(ToolError);
      await expect(lookup).rejects.toMatchObject({
        kind: 'ElementNotFound',
        message: 'Element not found within 30ms: css=#missing',
      });
    });

    it('lets a visibility wait that runs out of time surface as a WebDriver timeout', async () => {
      const { driver } = fakeWebDriver({ findElements: found('el-1'), isElementDisplayed: () => false });
      const browser = new SeleniumDriver(driver);

      const lookup = browser.findElement({ by: 'css', value: '#hidden', timeoutMs: 30 }, 'visible');
      await expect(lookup).rejects.toBeInstanceOf(wd.TimeoutError);
      await expect(lookup).rejects.toThrow('Element css=#hidden not visible within 30ms');
    });

    it('summarises a located element', async () => {
      const { driver } = fakeWebDriver({
        ...READY_ELEMENT,
        getElementTagName: () => 'button',
        getElementText: () => 'Go',
      });
      const browser = new SeleniumDriver(driver);

      expect(await browser.findElement({ by: 'css', value: '#go', timeoutMs: 30 }, 'clickable')).toEqual({
        tag: 'button',
        text: 'Go',
        displayed: true,
        enabled: true,
      });
    });
  });

  describe('click', () => {
    const intercepted = () => {
      throw new wd.ElementClickInterceptedError('covered by #overlay');
    };

    it('falls back to a script click when forced past an intercepted click', async () => {
      const { driver, named } = fakeWebDriver({ ...READY_ELEMENT, clickElement: intercepted, executeScript: () => null });
      const browser = new SeleniumDriver(driver);

      await browser.click({ by: 'css', value: '#go', timeoutMs: 30 }, { force: true });

      const scripts = named('executeScript');
      expect(scripts).toHaveLength(1);
      expect(scripts[0]?.getParameter('script')).toBe('arguments[0].click();');
      expect(scripts[0]?.getParameter('args')).toEqual([{ [ELEMENT_KEY]: 'el-1', ELEMENT: 'el-1' }]);
    });

    it('rethrows an intercepted click without force', async () => {
      const { driver, named } = fakeWebDriver({ ...READY_ELEMENT, clickElement: intercepted });
      const browser = new SeleniumDriver(driver);

      await expect(browser.click({ by: 'css', value: '#go', timeoutMs: 30 }, { force: false })).rejects.toBeInstanceOf(
        wd.ElementClickInterceptedError,
      );
      expect(named('executeScript')).toHaveLength(0);
    });
  });

  it('types one character at a time when given a delay', async () => {
    const { driver, named } = fakeWebDriver({ ...READY_ELEMENT, sendKeysToElement: () => null });
    const browser = new SeleniumDriver(driver);

    await browser.sendKeys({ by: 'css', value: '#q', timeoutMs: 30 }, 'abc', { clearFirst: false, typeDelayMs: 1 });

    expect(named('sendKeysToElement').map((command) => command.getParameter('text'))).toEqual(['a', 'b', 'c']);
    expect(named('clearElement')).toHaveLength(0);
  });

  it('waits for the document to finish loading after navigating', async () => {
    const states = ['loading', 'complete'];
    const { driver, named } = fakeWebDriver({
      get: () => null,
      executeScript: () => states.shift() ?? 'complete',
      getCurrentUrl: () => 'https://example.test/done',
    });
    const browser = new SeleniumDriver(driver);

    expect(await browser.navigate('https://example.test/', { waitForLoad: true, timeoutMs: 2000 })).toBe(
      'https://example.test/done',
    );
    expect(named('get')[0]?.getParameter('url')).toBe('https://example.test/');
    expect(named('executeScript')).toHaveLength(2);
  });

  it('returns script results as plain JSON', async () => {
    const { driver } = fakeWebDriver({
      executeScript: () => ({ items: [{ [ELEMENT_KEY]: 'el-9' }], count: 2, missing: null }),
    });
    const browser = new SeleniumDriver(driver);

    expect(await browser.executeScript('return stuff();', [])).toEqual({
      items: [{ element: 'el-9' }],
      count: 2,
      missing: null,
    });
  });

  describe('full page screenshot', () => {
    it('restores the window size even when the capture fails', async () => {
      const { driver, named } = fakeWebDriver({
        getWindowRect: () => ({ x: 0, y: 0, width: 800, height: 600 }),
        executeScript: () => ({ width: 1200, height: 3000.4 }),
        setWindowRect: () => null,
        screenshot: () => {
          throw new wd.WebDriverError('capture failed');
        },
      });
      const browser = new SeleniumDriver(driver);

      await expect(browser.screenshot({ fullPage: true })).rejects.toThrow('capture failed');
      expect(
        named('setWindowRect').map((command) => [command.getParameter('width'), command.getParameter('height')]),
      ).toEqual([
        [1200, 3001],
        [800, 600],
      ]);
    });

    it('captures the viewport without touching the window', async () => {
      const { driver, named } = fakeWebDriver({ screenshot: () => Buffer.from('png-bytes').toString('base64') });
      const browser = new SeleniumDriver(driver);

      expect((await browser.screenshot({ fullPage: false })).toString()).toBe('png-bytes');
      expect(named('getWindowRect')).toHaveLength(0);
    });
  });
});

describe('toJsonValue', () => {
  it('replaces elements at any depth', async () => {
    const { driver } = fakeWebDriver({});
    const value = { rows: [[new WebElement(driver, 'el-2')]], label: 'x' };
    expect(await toJsonValue(value)).toEqual({ rows: [[{ element: 'el-2' }]], label: 'x' });
  });

  it('maps undefined to null and stringifies what JSON cannot hold', async () => {
    expect(await toJsonValue(undefined)).toBeNull();
    expect(await toJsonValue([1n, true, 'a'])).toEqual(['1', true, 'a']);
    expect(await toJsonValue(new Date(0))).toBe(String(new Date(0)));
  });
});

describe('prepareSession', () => {
  const config = { ...DEFAULT_CONFIG, pageLoadTimeoutMs: 5000 };

  it('applies the page load timeout', async () => {
    const { driver, named } = fakeWebDriver({ setTimeout: () => null });

    await prepareSession(driver, config, silentLogger);

    expect(named('setTimeout')[0]?.getParameter('pageLoad')).toBe(5000);
    expect(named('quit')).toHaveLength(0);
  });

  it('quits the driver when setup fails, then rethrows', async () => {
    const { driver, named } = fakeWebDriver({
      setTimeout: () => {
        throw new wd.WebDriverError('timeouts rejected');
      },
      quit: () => null,
    });

    await expect(prepareSession(driver, config, silentLogger)).rejects.toThrow('timeouts rejected');
    expect(named('quit')).toHaveLength(1);
  });

  it('keeps the setup error when quitting fails too', async () => {
    const lines: string[] = [];
    const log = createLogger({ level: 'warn', scope: 'driver', write: (line) => lines.push(line) });
    const { driver } = fakeWebDriver({
      setTimeout: () => {
        throw new wd.WebDriverError('timeouts rejected');
      },
      quit: () => {
        throw new wd.NoSuchSessionError('already gone');
      },
    });

    await expect(prepareSession(driver, config, log)).rejects.toThrow('timeouts rejected');
    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatch(/^\[driver\] warn: Failed to quit a driver that did not finish setup: [^\n]*already gone/);
  });
});
