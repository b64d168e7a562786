/**
 * Studio agent — the reason/act loop for one chat turn
 *
 * Phases: awaiting_decision → tool_executing → observing → (awaiting_decision)
 * → finalizing → done, with budget_exceeded and failed as the other exits.
 *
 * One tool call per decision, never retried by the loop. A failed tool call
 * is an observation the policy sees on its next decision; only an
 * unavailable reasoning step or a store that keeps failing ends the turn.
 */

import { DOMAINS, type Domain, type PanelId } from '../../shared/types.js';
import { panelsForDomains } from '../../shared/dashboard-sync.js';
import { BudgetExceeded, ReasoningUnavailable, StoreUnavailable, errorMessage } from './errors.js';
import { buildSystemPrompt } from './prompts/system.js';
import type { Decision, DecisionMode, DecisionPolicy, DecisionRequest } from './reasoning/types.js';
import { toolEntryContent, type ToolCallRecord, type TurnSession } from './session-state.js';
import type { ToolRegistry } from './tools/registry.js';

export type AgentPhase =
  | 'awaiting_decision'
  | 'tool_executing'
  | 'observing'
  | 'finalizing'
  | 'done'
  | 'budget_exceeded'
  | 'failed';

export interface TurnObserver {
  onPhase?(phase: AgentPhase): void;
  onToolStart?(call: { callId: string; name: string; input: Record<string, unknown> }): void;
  onToolResult?(record: ToolCallRecord): void;
}

export interface TurnOutcome {
  status: 'done' | 'budget_exceeded' | 'failed';
  answer: string;
  /** Empty for failed turns */
  touchedDomains: Domain[];
  refreshPanels: PanelId[];
  /** Every call attempted this turn, in order */
  toolCalls: ToolCallRecord[];
  iterations: number;
  budget?: BudgetExceeded['reason'];
  failure?: { kind: 'reasoning_unavailable' | 'store_unavailable'; message: string };
}

export interface AgentOptions {
  maxToolCalls: number;
  /** 0 disables the timeout */
  decisionTimeoutMs: number;
  storeFailureLimit: number;
  /** Session entries handed to the policy per decision */
  contextEntries: number;
  contextTokens?: number;
}

export const GENERIC_APOLOGY =
  "Sorry, something went wrong on my side and I couldn't finish that. Nothing more was changed; please try again in a moment.";

const TIMED_OUT = Symbol('timed out');

export class StudioAgent {
  private readonly now: () => string;

  constructor(
    private readonly registry: ToolRegistry,
    private readonly policy: DecisionPolicy,
    private readonly options: AgentOptions,
    now?: () => string,
  ) {
    this.now = now ?? (() => new Date().toISOString());
  }

  async runTurn(session: TurnSession, message: string, observer: TurnObserver = {}): Promise<TurnOutcome> {
    session.summarize();
    session.append({ role: 'user', content: message, timestamp: this.now() });
    console.log(`[Agent] Turn started for session ${session.id} (policy: ${this.policy.name})`);

    const records: ToolCallRecord[] = [];
    const touched = new Set<Domain>();
    let consecutiveStoreFailures = 0;
    let iterations = 0;

    for (;;) {
      observer.onPhase?.('awaiting_decision');
      iterations++;

      let decision: Decision | typeof TIMED_OUT;
      try {
        decision = await this.decide(session, 'normal');
      } catch (error) {
        return this.fail(session, records, iterations, observer, {
          kind: 'reasoning_unavailable',
          message: errorMessage(error),
        });
      }

      if (decision === TIMED_OUT) {
        const budget = new BudgetExceeded('decision_timeout', `No decision within ${this.options.decisionTimeoutMs}ms`);
        console.warn(`[Agent] ${budget.message}`);
        return this.exceedBudget(session, records, touched, iterations, observer, budget, false);
      }

      if (decision.kind === 'answer') {
        // Nothing committed and the store rejected every call: the answer
        // could only relay a driver message
        if (records.length > 0 && records.every(isStoreFailure)) {
          return this.fail(session, records, iterations, observer, {
            kind: 'store_unavailable',
            message: new StoreUnavailable(records.length).message,
          });
        }
        observer.onPhase?.('finalizing');
        const answer = decision.text.trim() || summarizeRecords(records);
        return this.finish(session, 'done', answer, records, touched, iterations, observer);
      }

      if (records.length >= this.options.maxToolCalls) {
        const budget = new BudgetExceeded('tool_limit', `Reached ${this.options.maxToolCalls} tool calls`);
        console.warn(`[Agent] ${budget.message}; asking for a final answer`);
        return this.exceedBudget(session, records, touched, iterations, observer, budget, true);
      }

      const record = await this.execute(decision, observer);
      records.push(record);

      observer.onPhase?.('observing');
      session.append({ role: 'tool', content: toolEntryContent(record), timestamp: this.now(), call: record });
      for (const domain of record.affectedDomains) touched.add(domain);
      observer.onToolResult?.(record);

      consecutiveStoreFailures = isStoreFailure(record) ? consecutiveStoreFailures + 1 : 0;
      if (consecutiveStoreFailures >= this.options.storeFailureLimit) {
        const failure = new StoreUnavailable(consecutiveStoreFailures);
        return this.fail(session, records, iterations, observer, {
          kind: 'store_unavailable',
          message: failure.message,
        });
      }
    }
  }

  private async execute(
    decision: Extract<Decision, { kind: 'tool_call' }>,
    observer: TurnObserver,
  ): Promise<ToolCallRecord> {
    observer.onPhase?.('tool_executing');
    observer.onToolStart?.({ callId: decision.callId, name: decision.tool, input: decision.input });

    const startedAt = Date.now();
    const result = await this.registry.invoke(decision.tool, decision.input);
    const durationMs = Date.now() - startedAt;

    console.log(`[Agent] ${decision.tool} → ${result.success ? 'ok' : `failed (${result.error.kind})`} in ${durationMs}ms`);
    return result.success
      ? {
          callId: decision.callId,
          name: decision.tool,
          input: decision.input,
          success: true,
          output: result.output,
          affectedDomains: result.affectedDomains,
          durationMs,
        }
      : {
          callId: decision.callId,
          name: decision.tool,
          input: decision.input,
          success: false,
          error: result.error,
          affectedDomains: [],
          durationMs,
        };
  }

  /** Ask the policy for the next decision, bounded by the decision timeout */
  private async decide(session: TurnSession, mode: DecisionMode): Promise<Decision | typeof TIMED_OUT> {
    const request: DecisionRequest = {
      systemPrompt: buildSystemPrompt(session.digest),
      digest: session.digest,
      entries: session.getContext({ maxEntries: this.options.contextEntries, maxTokens: this.options.contextTokens }),
      tools: this.registry.listTools(),
      mode,
    };

    const callPolicy = async (signal?: AbortSignal): Promise<Decision> => {
      try {
        return await this.policy.decide({ ...request, signal });
      } catch (error) {
        if (error instanceof ReasoningUnavailable) throw error;
        throw new ReasoningUnavailable(errorMessage(error), { cause: error });
      }
    };

    const timeoutMs = this.options.decisionTimeoutMs;
    if (timeoutMs <= 0) return callPolicy();

    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<typeof TIMED_OUT>(resolve => {
      timer = setTimeout(() => {
        controller.abort();
        resolve(TIMED_OUT);
      }, timeoutMs);
    });

    try {
      return await Promise.race([callPolicy(controller.signal), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  private async exceedBudget(
    session: TurnSession,
    records: ToolCallRecord[],
    touched: Set<Domain>,
    iterations: number,
    observer: TurnObserver,
    budget: BudgetExceeded,
    askForAnswer: boolean,
  ): Promise<TurnOutcome> {
    observer.onPhase?.('budget_exceeded');

    let answer = '';
    if (askForAnswer) {
      try {
        const decision = await this.decide(session, 'finalize');
        if (decision !== TIMED_OUT && decision.kind === 'answer') answer = decision.text.trim();
      } catch (error) {
        console.warn(`[Agent] Final answer unavailable: ${errorMessage(error)}`);
      }
    }

    const outcome = this.finish(
      session,
      'budget_exceeded',
      answer || fallbackAnswer(records, budget.reason),
      records,
      touched,
      iterations,
      observer,
    );
    return { ...outcome, budget: budget.reason };
  }

  private finish(
    session: TurnSession,
    status: 'done' | 'budget_exceeded',
    answer: string,
    records: ToolCallRecord[],
    touched: Set<Domain>,
    iterations: number,
    observer: TurnObserver,
  ): TurnOutcome {
    session.append({ role: 'assistant', content: answer, timestamp: this.now() });
    const touchedDomains = DOMAINS.filter(domain => touched.has(domain));
    observer.onPhase?.(status);
    console.log(
      `[Agent] Turn ${status} for session ${session.id}: ${records.length} tool calls, touched [${touchedDomains.join(', ')}]`,
    );
    return {
      status,
      answer,
      touchedDomains,
      refreshPanels: panelsForDomains(touchedDomains),
      toolCalls: records,
      iterations,
    };
  }

  private fail(
    session: TurnSession,
    records: ToolCallRecord[],
    iterations: number,
    observer: TurnObserver,
    failure: NonNullable<TurnOutcome['failure']>,
  ): TurnOutcome {
    console.error(`[Agent] Turn failed for session ${session.id}: ${failure.kind}: ${failure.message}`);
    session.append({ role: 'assistant', content: GENERIC_APOLOGY, timestamp: this.now() });
    observer.onPhase?.('failed');
    return {
      status: 'failed',
      answer: GENERIC_APOLOGY,
      touchedDomains: [],
      refreshPanels: [],
      toolCalls: records,
      iterations,
      failure,
    };
  }
}

function isStoreFailure(record: ToolCallRecord): boolean {
  return !record.success && record.error?.kind === 'store';
}

function summarizeRecords(records: ToolCallRecord[]): string {
  if (records.length === 0) return "I don't have anything to add to that.";
  const succeeded = records.filter(record => record.success).map(record => record.name);
  const failed = records.filter(record => !record.success).map(record => record.name);
  const parts: string[] = [];
  if (succeeded.length > 0) parts.push(`Completed: ${succeeded.join(', ')}.`);
  if (failed.length > 0) parts.push(`Failed: ${failed.join(', ')}.`);
  return parts.join(' ');
}

/** Answer used when the budget ran out and no final answer came back */
export function fallbackAnswer(records: ToolCallRecord[], reason: BudgetExceeded['reason']): string {
  const lead =
    reason === 'decision_timeout'
      ? 'I ran out of time before finishing this request.'
      : 'I reached the step limit for one request before finishing.';
  if (records.length === 0) return `${lead} No changes were made.`;
  return `${lead} ${summarizeRecords(records)} Ask me to continue if you want the rest.`;
}
