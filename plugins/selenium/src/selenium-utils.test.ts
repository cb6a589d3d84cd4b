import { describe, it, expect } from 'vitest';
import { By, Key } from 'selenium-webdriver';
import { ToolError } from './errors.js';
import { browserArguments, describeQuery, resolveKey, toBy } from './selenium-utils.js';

describe('toBy', () => {
  it('maps each locator strategy', () => {
    expect(toBy('id', 'main')).toEqual(By.id('main'));
    expect(toBy('css', '.card > a')).toEqual(By.css('.card > a'));
    expect(toBy('xpath', '//button')).toEqual(By.xpath('//button'));
    expect(toBy('name', 'q')).toEqual(By.name('q'));
    expect(toBy('class', 'btn')).toEqual(By.className('btn'));
  });

  it('treats a tag name as a CSS selector', () => {
    expect(toBy('tag', 'h1')).toEqual(By.css('h1'));
  });
});

describe('describeQuery', () => {
  it('joins strategy and value', () => {
    expect(describeQuery({ by: 'css', value: '#submit' })).toBe('css=#submit');
  });
});

describe('resolveKey', () => {
  it('passes single characters through', () => {
    expect(resolveKey('a')).toBe('a');
    expect(resolveKey(' ')).toBe(' ');
  });

  it('resolves named keys case-insensitively', () => {
    expect(resolveKey('Enter')).toBe(Key.ENTER);
    expect(resolveKey('ESC')).toBe(Key.ESCAPE);
    expect(resolveKey('F5')).toBe(Key.F5);
  });

  it('ignores spaces, dashes and underscores', () => {
    expect(resolveKey('page_down')).toBe(Key.PAGE_DOWN);
    expect(resolveKey('Arrow-Up')).toBe(Key.ARROW_UP);
    expect(resolveKey('page up')).toBe(Key.PAGE_UP);
  });

  it('rejects unknown names as InvalidArguments', () => {
    expect(() => resolveKey('Hyper')).toThrow(ToolError);
    expect(() => resolveKey('Hyper')).toThrow('Unknown key: Hyper');
    expect(() => resolveKey('constructor')).toThrow('Unknown key: constructor');
  });
});

describe('browserArguments', () => {
  it('returns nothing for default options', () => {
    expect(browserArguments('chrome', {})).toEqual([]);
  });

  it('builds chromium switches', () => {
    expect(
      browserArguments('edge', { headless: true, arguments: ['--no-sandbox'], window_size: { width: 1280, height: 720 } }),
    ).toEqual(['--headless=new', '--no-sandbox', '--window-size=1280,720']);
  });

  it('builds firefox switches', () => {
    expect(
      browserArguments('firefox', { headless: true, arguments: ['-private'], window_size: { width: 800, height: 600 } }),
    ).toEqual(['--headless', '-private', '--width=800', '--height=600']);
  });
});
