import {
  AgentConfigSchema,
  type AgentConfig,
  type AgentConfigInput,
} from '../types/config.js';
import {
  FINISH_ACTION,
  INVALID_ACTION,
  type AgentResult,
  type AgentStep,
  type AgentTask,
  type Oracle,
  type OracleRequest,
  type OracleResponse,
  type RunOptions,
  type RunStatus,
  type TerminalStatus,
} from '../types/index.js';
import { parseAction } from './action-parser.js';
import { CancelledError, errorMessage } from './errors.js';
import { withRetry, withTimeout } from './retry.js';
import type { ToolRegistry } from './tool-registry.js';
import { IdGenerator, renderValue, truncate } from './utils.js';

export interface AgentRunnerOptions {
  registry: ToolRegistry;
  oracle: Oracle;
  config?: AgentConfigInput;
  onProgress?: (message: string) => void;
  onStep?: (step: AgentStep, iteration: number, runId: string) => void;
}

/**
 * Transient state of one execution. Never shared between runs.
 */
interface AgentRun {
  id: string;
  task: AgentTask;
  steps: AgentStep[];
  iterations: number;
  status: RunStatus;
  startedAt: Date;
}

type Halt = { status: TerminalStatus; output: string };

/**
 * Drives the Thought -> Action -> Observation cycle.
 *
 * Each run keeps its state local to `run()`, so one runner can serve
 * concurrent runs. The registry must not be modified while runs are in
 * flight.
 */
export class AgentRunner {
  private registry: ToolRegistry;
  private oracle: Oracle;
  private config: AgentConfig;
  private options: AgentRunnerOptions;

  constructor(options: AgentRunnerOptions) {
    this.options = options;
    this.registry = options.registry;
    this.oracle = options.oracle;
    this.config = AgentConfigSchema.parse(options.config ?? {});
  }

  /**
   * Run a task to a terminal status.
   * Never rejects: failures are reported through the result's status.
   */
  async run(
    task: string,
    context: Record<string, unknown> = {},
    maxIterations: number = this.config.maxIterations,
    options: RunOptions = {}
  ): Promise<AgentResult> {
    const run: AgentRun = {
      id: IdGenerator.run(),
      task: { task, context, maxIterations },
      steps: [],
      iterations: 0,
      status: 'running',
      startedAt: new Date(),
    };

    if (!Number.isFinite(maxIterations) || maxIterations <= 0) {
      return this.finish(
        run,
        'exhausted',
        `Iteration budget is ${maxIterations}; no steps were run`
      );
    }

    const bound = Math.floor(maxIterations);
    const deadline =
      this.config.maxRunDurationMs !== undefined
        ? run.startedAt.getTime() + this.config.maxRunDurationMs
        : undefined;

    this.log(`Starting run ${run.id}: ${truncate(task, 80)}`);

    while (run.iterations < bound) {
      const halt = this.checkHalt(run, options.signal, deadline);
      if (halt) {
        return this.finish(run, halt.status, halt.output);
      }

      this.log(`Iteration ${run.iterations + 1}/${bound}`);

      let response: OracleResponse;
      try {
        response = await this.propose(
          {
            task,
            context,
            catalog: this.registry.list(),
            steps: [...run.steps],
          },
          options.signal
        );
      } catch (error) {
        if (options.signal?.aborted || error instanceof CancelledError) {
          return this.finish(run, 'failed', this.cancellationReason(options.signal, error));
        }
        return this.finish(
          run,
          'failed',
          `Oracle failed after ${this.config.oracleRetries + 1} attempt(s): ${errorMessage(error)}`
        );
      }

      run.iterations += 1;

      const parsed = parseAction(response);
      if (!parsed.ok) {
        this.record(run, {
          thought: '',
          action: INVALID_ACTION,
          actionInput: {},
          observation: `invalid action format: ${parsed.error.message}`,
        });
        continue;
      }

      const { thought, action, actionInput } = parsed.action;

      if (action === FINISH_ACTION) {
        const finalOutput =
          'output' in actionInput ? actionInput.output : actionInput;
        this.record(run, {
          thought,
          action,
          actionInput,
          observation: renderValue(finalOutput),
        });
        return this.finish(run, 'completed', finalOutput);
      }

      const result = await this.registry.dispatch(action, actionInput, {
        timeoutMs: this.config.toolTimeoutMs,
        signal: options.signal,
        context,
      });

      this.record(run, {
        thought,
        action,
        actionInput,
        observation: result.success
          ? renderValue(result.value)
          : `Error: ${result.error.message}`,
      });
    }

    if (options.signal?.aborted) {
      return this.finish(run, 'failed', this.cancellationReason(options.signal));
    }
    return this.finish(run, 'exhausted', this.exhaustionSummary(run, bound));
  }

  /**
   * Ask the oracle for the next step, with a per-call timeout and retries
   */
  private propose(
    request: OracleRequest,
    signal: AbortSignal | undefined
  ): Promise<OracleResponse> {
    return withRetry(
      () =>
        withTimeout((callSignal) => this.oracle.propose(request, callSignal), {
          label: 'Oracle call',
          timeoutMs: this.config.oracleTimeoutMs,
          signal,
        }),
      {
        maxRetries: this.config.oracleRetries,
        initialDelayMs: this.config.retryBackoffMs,
        signal,
        onRetry: (error, attempt, delayMs) => {
          this.log(
            `Oracle call failed (${errorMessage(error)}); retry ${attempt}/${this.config.oracleRetries} in ${delayMs}ms`
          );
        },
      }
    );
  }

  /**
   * Checks made between iterations
   */
  private checkHalt(
    run: AgentRun,
    signal: AbortSignal | undefined,
    deadline: number | undefined
  ): Halt | null {
    if (signal?.aborted) {
      return { status: 'failed', output: this.cancellationReason(signal) };
    }
    if (deadline !== undefined && Date.now() >= deadline) {
      const last = run.steps.at(-1);
      return {
        status: 'exhausted',
        output: `Run exceeded its time budget of ${this.config.maxRunDurationMs}ms after ${run.steps.length} step(s)${
          last ? `. Last observation: ${truncate(last.observation, 500)}` : ''
        }`,
      };
    }
    return null;
  }

  private cancellationReason(
    signal: AbortSignal | undefined,
    error?: unknown
  ): string {
    const reason: unknown = signal?.aborted ? signal.reason : error;
    if (reason instanceof CancelledError || reason === undefined) {
      return reason ? `Run cancelled: ${reason.message}` : 'Run cancelled';
    }
    return `Run cancelled: ${errorMessage(reason)}`;
  }

  private exhaustionSummary(run: AgentRun, bound: number): string {
    const last = run.steps.at(-1);
    return `Reached the limit of ${bound} iteration(s) without finishing. Last observation: ${
      last ? truncate(last.observation, 500) : '(none)'
    }`;
  }

  private record(run: AgentRun, step: AgentStep): void {
    const frozen = Object.freeze({
      ...step,
      actionInput: Object.freeze({ ...step.actionInput }),
    });
    run.steps.push(frozen);

    this.log(
      `${frozen.action || '(invalid)'} -> ${truncate(frozen.observation)}`
    );
    this.options.onStep?.(frozen, run.iterations, run.id);
  }

  private finish(
    run: AgentRun,
    status: TerminalStatus,
    finalOutput: unknown
  ): AgentResult {
    run.status = status;
    const completedAt = new Date();

    this.log(`Run ${run.id} ${status} after ${run.steps.length} step(s)`);

    return Object.freeze({
      runId: run.id,
      status,
      finalOutput,
      steps: Object.freeze([...run.steps]),
      iterations: run.iterations,
      startedAt: run.startedAt.toISOString(),
      completedAt: completedAt.toISOString(),
      durationMs: completedAt.getTime() - run.startedAt.getTime(),
    });
  }

  private log(message: string): void {
    this.options.onProgress?.(message);
  }
}
