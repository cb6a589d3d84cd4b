import { classifyFailure, failure, type CommandResult } from './errors.js';
import { TOOLS, type ToolContext, type ToolDefinition } from './tools.js';

/**
 * Routes a tool call through lookup, validation, session resolution and the
 * driver, and always answers with a CommandResult.
 *
 * Calls are served strictly one after another: driver handles are not safe
 * for concurrent use, so every call waits for the previous one to settle.
 */
export class Dispatcher {
  private readonly tools: ReadonlyMap<string, ToolDefinition>;
  private queue: Promise<unknown> = Promise.resolve();

  constructor(
    private readonly ctx: ToolContext,
    tools: readonly ToolDefinition[] = TOOLS,
  ) {
    this.tools = new Map(tools.map((tool) => [tool.name, tool]));
  }

  listTools(): ToolDefinition[] {
    return Array.from(this.tools.values());
  }

  dispatch(name: string, args: unknown): Promise<CommandResult> {
    return this.enqueue(() => this.execute(name, args));
  }

  /** Closes every session once the calls already queued have settled. */
  closeAll(): Promise<number> {
    return this.enqueue(() => this.ctx.registry.closeAll());
  }

  private enqueue<T>(run: () => Promise<T>): Promise<T> {
    const result = this.queue.then(run, run);
    this.queue = result;
    return result;
  }

  private async execute(name: string, args: unknown): Promise<CommandResult> {
    const { log } = this.ctx;

    const tool = this.tools.get(name);
    if (!tool) {
      log.warn(`Unknown tool: ${name}`);
      return failure('UnknownTool', `Unknown tool: ${name}`);
    }

    const call = tool.parse(args);
    if (!call.ok) {
      log.warn(`Invalid arguments for ${name}:`, call.issues.join('; '));
      return failure('InvalidArguments', `Invalid arguments for ${name}`, call.issues);
    }

    const started = Date.now();
    try {
      const payload = await call.invoke(this.ctx);
      log.debug(`${name} succeeded in ${Date.now() - started}ms`);
      return { success: true, payload };
    } catch (err) {
      const error = classifyFailure(err, tool.failureKind);
      log.warn(`${name} failed (${error.kind}): ${error.message}`);
      return { success: false, error };
    }
  }
}
