/**
 * Runs a scripted list of tool calls through a dispatcher, one after
 * another, the same way an MCP client would send them.
 */

import { z } from 'zod';
import type { Dispatcher } from './dispatcher.js';
import type { CommandResult } from './errors.js';

const StepSchema = z
  .object({
    tool: z.string().min(1),
    arguments: z.record(z.unknown()).default({}),
  })
  .strict();

const ScriptSchema = z.array(StepSchema);

export type Step = z.infer<typeof StepSchema>;

export class ScriptError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ScriptError';
  }
}

export interface StepOutcome {
  step: number;
  tool: string;
  result: CommandResult;
}

export interface ScriptSummary {
  ran: number;
  failed: number;
  skipped: number;
}

export function parseScript(text: string): Step[] {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new ScriptError(`Steps file is not valid JSON: ${err instanceof Error ? err.message : err}`);
  }
  const parsed = ScriptSchema.safeParse(raw);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ScriptError(`Invalid steps: ${problems.join('; ')}`);
  }
  return parsed.data;
}

export interface CliOptions {
  file: string;
  keepGoing: boolean;
}

export function parseCliArgs(argv: readonly string[]): CliOptions {
  const keepGoing = argv.includes('--keep-going');
  const positional = argv.filter((arg) => !arg.startsWith('--'));
  const unknown = argv.filter((arg) => arg.startsWith('--') && arg !== '--keep-going');
  if (unknown.length > 0) {
    throw new ScriptError(`Unknown option: ${unknown[0]}`);
  }
  if (positional.length !== 1) {
    throw new ScriptError('Usage: selenium-mcp-run <steps.json> [--keep-going]');
  }
  return { file: positional[0], keepGoing };
}

/**
 * Dispatch each step in order, reporting every outcome. Stops at the first
 * failure unless `keepGoing` is set; the remaining steps count as skipped.
 */
export async function runScript(
  dispatcher: Dispatcher,
  steps: readonly Step[],
  options: { keepGoing: boolean; report: (outcome: StepOutcome) => void },
): Promise<ScriptSummary> {
  let ran = 0;
  let failed = 0;
  for (const [index, step] of steps.entries()) {
    const result = await dispatcher.dispatch(step.tool, step.arguments);
    ran++;
    options.report({ step: index + 1, tool: step.tool, result });
    if (!result.success) {
      failed++;
      if (!options.keepGoing) break;
    }
  }
  return { ran, failed, skipped: steps.length - ran };
}
