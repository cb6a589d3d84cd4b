/**
 * The tool table: one strict zod schema and one runner per tool.
 *
 * Tool names and argument names are the wire contract with MCP clients and
 * must not change.
 */

import { existsSync, statSync } from 'fs';
import { resolve } from 'path';
import { z } from 'zod';
import type { ServerConfig } from './config.js';
import { LOCATOR_STRATEGIES, type ElementQuery } from './driver.js';
import { ToolError, type FailureKind } from './errors.js';
import type { Logger } from './log.js';
import { inlineScreenshot, saveScreenshot } from './screenshot.js';
import { describeQuery, resolveKey } from './selenium-utils.js';
import type { Session, SessionRegistry } from './session-registry.js';

export interface ToolContext {
  registry: SessionRegistry;
  config: ServerConfig;
  log: Logger;
}

export type ParsedCall =
  | { ok: false; issues: string[] }
  | { ok: true; invoke: (ctx: ToolContext) => Promise<unknown> };

export interface ToolDefinition {
  name: string;
  description: string;
  schema: z.AnyZodObject;
  /** Kind reported for WebDriver failures that have no more specific kind. */
  failureKind: FailureKind;
  parse(args: unknown): ParsedCall;
}

type StrictObject<S extends z.ZodRawShape> = z.ZodObject<S, 'strict'>;
type Args<S extends z.ZodRawShape> = z.infer<StrictObject<S>>;

const sessionField = {
  session_id: z.string().min(1).optional().describe('Session to act on (defaults to the active session)'),
};
type SessionShape = typeof sessionField;

const SessionTarget = z.object(sessionField).passthrough();

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(arguments)'}: ${issue.message}`);
}

interface RegistryToolInit<S extends z.ZodRawShape> {
  name: string;
  description: string;
  input: S;
  run(args: Args<S>, ctx: ToolContext): Promise<unknown>;
}

interface BrowserToolInit<S extends z.ZodRawShape> {
  name: string;
  description: string;
  input: S;
  failureKind?: FailureKind;
  run(args: Args<S & SessionShape>, session: Session, ctx: ToolContext): Promise<unknown>;
}

/** A tool that manages sessions rather than driving one. */
function registryTool<S extends z.ZodRawShape>(tool: RegistryToolInit<S>): ToolDefinition {
  const schema: StrictObject<S> = z.object(tool.input).strict();
  return {
    name: tool.name,
    description: tool.description,
    schema,
    failureKind: 'UnknownFailure',
    parse(args) {
      const parsed = schema.safeParse(args ?? {});
      if (!parsed.success) return { ok: false, issues: formatIssues(parsed.error) };
      const values = parsed.data;
      return { ok: true, invoke: (ctx) => tool.run(values, ctx) };
    },
  };
}

/** A tool that acts on one session, named by `session_id` or the active one. */
function browserTool<S extends z.ZodRawShape>(tool: BrowserToolInit<S>): ToolDefinition {
  const schema: StrictObject<S & SessionShape> = z.object({ ...tool.input, ...sessionField }).strict();
  return {
    name: tool.name,
    description: tool.description,
    schema,
    failureKind: tool.failureKind ?? 'UnknownFailure',
    parse(args) {
      const parsed = schema.safeParse(args ?? {});
      if (!parsed.success) return { ok: false, issues: formatIssues(parsed.error) };
      const values = parsed.data;
      const { session_id: sessionId } = SessionTarget.parse(args ?? {});
      return {
        ok: true,
        invoke: async (ctx) => {
          const session = ctx.registry.resolve(sessionId);
          const payload = await tool.run(values, session, ctx);
          ctx.registry.touch(session.id);
          return payload;
        },
      };
    },
  };
}

// ---------- Shared fields ----------

const locator = {
  by: z.enum(LOCATOR_STRATEGIES).describe('Locator strategy to find the element'),
  value: z.string().min(1).describe('Value for the locator strategy'),
};

const timeout = {
  timeout: z.number().positive().optional().describe('Maximum time to wait for the element in milliseconds'),
};

function query(args: { by: ElementQuery['by']; value: string; timeout?: number }, ctx: ToolContext): ElementQuery {
  return { by: args.by, value: args.value, timeoutMs: args.timeout ?? ctx.config.defaultTimeoutMs };
}

const scriptArgument = z.union([z.string(), z.number(), z.boolean(), z.null()]);

// ---------- Session management ----------

const startBrowser = registryTool({
  name: 'start_browser',
  description: 'Launch a browser in a new session and make it the active session.',
  input: {
    browser: z.string().min(1).describe('Browser to launch: chrome, firefox or edge'),
    options: z
      .object({
        headless: z.boolean().optional().describe('Run the browser without a window'),
        arguments: z.array(z.string()).optional().describe('Additional browser command-line arguments'),
        window_size: z
          .object({ width: z.number().int().positive(), height: z.number().int().positive() })
          .strict()
          .optional()
          .describe('Initial window size'),
      })
      .strict()
      .optional(),
    session_name: z.string().optional().describe('Optional label for the session'),
  },
  async run(args, ctx) {
    const session = await ctx.registry.create(args.browser, args.options ?? {}, args.session_name);
    return { session };
  },
});

const listSessions = registryTool({
  name: 'list_sessions',
  description: 'List all open browser sessions.',
  input: {},
  async run(_args, ctx) {
    return { sessions: ctx.registry.list(), activeSessionId: ctx.registry.activeSessionId };
  },
});

const switchSession = registryTool({
  name: 'switch_session',
  description: 'Make another open session the active one.',
  input: {
    session_id: z.string().min(1).describe('Session ID to switch to'),
  },
  async run(args, ctx) {
    return { session: ctx.registry.switchActive(args.session_id) };
  },
});

const closeSession = registryTool({
  name: 'close_session',
  description: 'Close a browser session. Closes the active session when no ID is given.',
  input: {
    session_id: z.string().min(1).optional().describe('Session ID to close'),
  },
  async run(args, ctx) {
    return { closed: await ctx.registry.close(args.session_id) };
  },
});

// ---------- Navigation & page ----------

const navigate = browserTool({
  name: 'navigate',
  description: 'Navigate the browser to a URL.',
  failureKind: 'NavigationFailure',
  input: {
    url: z.string().min(1).describe('URL to navigate to'),
    wait_for_load: z.boolean().default(true).describe('Wait for document.readyState to be complete'),
  },
  async run(args, session, ctx) {
    const url = await session.driver.navigate(args.url, {
      waitForLoad: args.wait_for_load,
      timeoutMs: ctx.config.pageLoadTimeoutMs,
    });
    ctx.registry.touch(session.id, url);
    return { url, title: await session.driver.title() };
  },
});

const getPageInfo = browserTool({
  name: 'get_page_info',
  description: 'Get the title, URL and optionally the source of the current page.',
  input: {
    include_title: z.boolean().default(true).describe('Include the page title'),
    include_url: z.boolean().default(true).describe('Include the current URL'),
    include_source: z.boolean().default(false).describe('Include the page source'),
  },
  async run(args, session) {
    const info = await session.driver.pageInfo({
      title: args.include_title,
      url: args.include_url,
      source: args.include_source,
    });
    return { sessionId: session.id, ...info, timestamp: new Date().toISOString() };
  },
});

// ---------- Elements ----------

const findElement = browserTool({
  name: 'find_element',
  description: 'Find an element, waiting up to the timeout for it to appear.',
  input: {
    ...locator,
    ...timeout,
    wait_for_clickable: z.boolean().default(false).describe('Also wait for the element to be clickable'),
  },
  async run(args, session, ctx) {
    const element = await session.driver.findElement(
      query(args, ctx),
      args.wait_for_clickable ? 'clickable' : 'present',
    );
    return { found: describeQuery(args), element };
  },
});

const clickElement = browserTool({
  name: 'click_element',
  description: 'Click an element once it is clickable.',
  input: {
    ...locator,
    ...timeout,
    force_click: z.boolean().default(false).describe('Fall back to a JavaScript click if the click is intercepted'),
  },
  async run(args, session, ctx) {
    await session.driver.click(query(args, ctx), { force: args.force_click });
    return { clicked: describeQuery(args) };
  },
});

const sendKeys = browserTool({
  name: 'send_keys',
  description: 'Type text into an element.',
  input: {
    ...locator,
    text: z.string().describe('Text to enter into the element'),
    ...timeout,
    clear_first: z.boolean().default(true).describe('Clear the field before typing'),
    type_speed: z.number().min(0).default(0).describe('Delay between keystrokes in milliseconds'),
  },
  async run(args, session, ctx) {
    await session.driver.sendKeys(query(args, ctx), args.text, {
      clearFirst: args.clear_first,
      typeDelayMs: args.type_speed,
    });
    return { typed: args.text, into: describeQuery(args) };
  },
});

const getElementText = browserTool({
  name: 'get_element_text',
  description: 'Get the visible text of an element.',
  input: { ...locator, ...timeout },
  async run(args, session, ctx) {
    return { text: await session.driver.getText(query(args, ctx)) };
  },
});

const waitForElement = browserTool({
  name: 'wait_for_element',
  description: 'Wait for an element to be present, and optionally visible.',
  input: {
    ...locator,
    ...timeout,
    wait_for_visible: z.boolean().default(false).describe('Also wait for the element to be visible'),
  },
  async run(args, session, ctx) {
    const element = await session.driver.findElement(
      query(args, ctx),
      args.wait_for_visible ? 'visible' : 'present',
    );
    return { ready: describeQuery(args), element };
  },
});

// ---------- Pointer & keyboard ----------

const hover = browserTool({
  name: 'hover',
  description: 'Move the mouse over an element.',
  input: { ...locator, ...timeout },
  async run(args, session, ctx) {
    await session.driver.hover(query(args, ctx));
    return { hovered: describeQuery(args) };
  },
});

const dragAndDrop = browserTool({
  name: 'drag_and_drop',
  description: 'Drag an element and drop it onto another element.',
  input: {
    ...locator,
    ...timeout,
    targetBy: z.enum(LOCATOR_STRATEGIES).describe('Locator strategy to find the target element'),
    targetValue: z.string().min(1).describe('Value for the target locator strategy'),
  },
  async run(args, session, ctx) {
    const source = query(args, ctx);
    const target = query({ by: args.targetBy, value: args.targetValue, timeout: args.timeout }, ctx);
    await session.driver.dragAndDrop(source, target);
    return { source: describeQuery(source), target: describeQuery(target) };
  },
});

const doubleClick = browserTool({
  name: 'double_click',
  description: 'Double-click an element.',
  input: { ...locator, ...timeout },
  async run(args, session, ctx) {
    await session.driver.doubleClick(query(args, ctx));
    return { doubleClicked: describeQuery(args) };
  },
});

const rightClick = browserTool({
  name: 'right_click',
  description: 'Right-click (context click) an element.',
  input: { ...locator, ...timeout },
  async run(args, session, ctx) {
    await session.driver.rightClick(query(args, ctx));
    return { rightClicked: describeQuery(args) };
  },
});

const pressKey = browserTool({
  name: 'press_key',
  description: "Press a keyboard key, e.g. 'Enter', 'Tab', 'ArrowDown', 'F5' or a single character.",
  input: {
    key: z.string().min(1).describe('Key to press'),
  },
  async run(args, session) {
    await session.driver.pressKey(resolveKey(args.key));
    return { key: args.key };
  },
});

// ---------- Scripts, files, screenshots ----------

const executeScript = browserTool({
  name: 'execute_script',
  description: 'Execute JavaScript in the page. Use `return` to send a value back.',
  failureKind: 'ScriptError',
  input: {
    script: z.string().min(1).describe('JavaScript code to execute'),
    arguments: z.array(scriptArgument).default([]).describe('Arguments, available to the script as arguments[i]'),
  },
  async run(args, session) {
    const result = await session.driver.executeScript(args.script, args.arguments);
    return { result: result ?? null };
  },
});

const uploadFile = browserTool({
  name: 'upload_file',
  description: 'Upload a file through a file input element.',
  input: {
    ...locator,
    ...timeout,
    filePath: z.string().min(1).describe('Path of the file to upload'),
  },
  async run(args, session, ctx) {
    const filePath = resolve(args.filePath);
    if (!existsSync(filePath) || !statSync(filePath).isFile()) {
      throw new ToolError('InvalidArguments', `File not found: ${filePath}`, ['filePath: no such file']);
    }
    await session.driver.uploadFile(query(args, ctx), filePath);
    return { uploaded: filePath, into: describeQuery(args) };
  },
});

const takeScreenshot = browserTool({
  name: 'take_screenshot',
  description: 'Capture a PNG screenshot. Saved to outputPath when given, otherwise returned inline.',
  input: {
    outputPath: z.string().min(1).optional().describe('Where to save the screenshot'),
    full_page: z.boolean().default(false).describe('Capture the whole document rather than the viewport'),
  },
  async run(args, session, ctx) {
    const png = await session.driver.screenshot({ fullPage: args.full_page });
    if (args.outputPath) {
      return saveScreenshot(png, args.outputPath);
    }
    return inlineScreenshot(png, ctx.config.screenshotMaxDimension);
  },
});

export const TOOLS: readonly ToolDefinition[] = [
  startBrowser,
  listSessions,
  switchSession,
  closeSession,
  navigate,
  getPageInfo,
  findElement,
  clickElement,
  sendKeys,
  getElementText,
  waitForElement,
  hover,
  dragAndDrop,
  doubleClick,
  rightClick,
  pressKey,
  executeScript,
  uploadFile,
  takeScreenshot,
];

export const TOOL_NAMES: readonly string[] = TOOLS.map((tool) => tool.name);
