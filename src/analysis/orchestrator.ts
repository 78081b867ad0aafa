import type { CodeSandbox } from '../sandbox/sandbox';
import { extractCode } from '../sandbox/codeBlocks';
import type { SessionStore } from '../session/sessionStore';
import type { ExecutionOutcome, HypothesisOutcome, HypothesisRecord, HypothesisSuggestion } from '../types';
import type { CompletionClient } from '../utils/completionClient';
import { parseHypotheses } from '../utils/completionClient';
import { BadInputError, isAbortError } from '../utils/errors';
import { createLogger } from '../utils/logger';
import {
  ANALYSIS_PROMPT,
  HYPOTHESIS_PROMPT,
  SUMMARY_PROMPT,
  SYNTHESIS_PROMPT,
  analysisUserPrompt,
  summaryUserPrompt,
} from './prompts';
import { StageMachine, type StageEvent } from './stages';

const logger = createLogger('Orchestrator');

export type WorkflowEvent<T> = { type: 'partial'; content: string } | { type: 'complete'; result: T };

export interface WorkflowOptions {
  signal?: AbortSignal;
  /** Stream partial output; when false a single completion call is made. */
  streaming?: boolean;
}

export interface GenerateOptions extends WorkflowOptions {
  systemPrompt?: string;
}

export interface TestOptions {
  signal?: AbortSignal;
  analysisPrompt?: string;
}

function renderOutcome(outcome: HypothesisRecord['outcome']): string {
  if (outcome === undefined || outcome === null) {
    return '';
  }
  if (typeof outcome === 'string') {
    return outcome.trim();
  }
  return renderStructuredOutcome(outcome);
}

function renderStructuredOutcome(outcome: HypothesisOutcome): string {
  const summary = outcome.summary?.trim();
  if (summary) {
    return summary;
  }
  return `${outcome.success}. p-value: ${outcome.p_value.toFixed(6)}`;
}

/**
 * User content for the synthesis call. Records without an outcome are left out.
 */
export function synthesisContent(records: HypothesisRecord[]): string {
  return records
    .map((record) => ({ record, outcome: renderOutcome(record.outcome) }))
    .filter(({ outcome }) => outcome.length > 0)
    .map(({ record, outcome }) => `Hypothesis: ${record.title}\nBenefit: ${record.benefit}\nResult: ${outcome}`)
    .join('\n\n');
}

/**
 * Sequences completion calls and sandboxed execution into the analysis workflows.
 */
export class AnalysisOrchestrator {
  constructor(
    private readonly store: SessionStore,
    private readonly sandbox: CodeSandbox
  ) {}

  async executeTest(sessionId: string, analysisCode: string): Promise<ExecutionOutcome> {
    const dataset = await this.store.load(sessionId);
    return this.sandbox.execute(analysisCode, dataset);
  }

  async *generateHypotheses(
    sessionId: string,
    gateway: CompletionClient,
    options: GenerateOptions = {}
  ): AsyncGenerator<WorkflowEvent<HypothesisSuggestion[]>, void, undefined> {
    const { description } = await this.store.get(sessionId);
    const request = {
      systemPrompt: options.systemPrompt ?? HYPOTHESIS_PROMPT,
      userPrompt: description,
      structured: true,
    };

    if (!options.streaming) {
      yield { type: 'complete', result: await gateway.completeHypotheses(request, options.signal) };
      return;
    }

    let text = '';
    for await (const content of gateway.stream(request, options.signal)) {
      text = content;
      yield { type: 'partial', content };
    }
    yield { type: 'complete', result: parseHypotheses(text) };
  }

  /**
   * Run the hypothesis-testing stage machine. A stage failure ends the
   * sequence with a Failed event; cancellation is rethrown.
   */
  async *testHypothesis(
    sessionId: string,
    hypothesis: string,
    gateway: CompletionClient,
    options: TestOptions = {}
  ): AsyncGenerator<StageEvent, void, undefined> {
    const { signal } = options;
    const machine = new StageMachine();

    try {
      const record = await this.store.get(sessionId);
      yield machine.advance({ stage: 'AnalysisPending', analysis: '' });

      let analysis = '';
      for await (const content of gateway.stream(
        {
          systemPrompt: options.analysisPrompt ?? ANALYSIS_PROMPT,
          userPrompt: analysisUserPrompt(hypothesis, record.description),
        },
        signal
      )) {
        analysis = content;
        yield machine.advance({ stage: 'AnalysisPending', analysis });
      }

      yield machine.advance({ stage: 'AnalysisComplete', analysis, code: extractCode(analysis) });
      yield machine.advance({ stage: 'Executing' });

      const { success, pValue } = await this.executeTest(sessionId, analysis);
      yield machine.advance({ stage: 'Executed', success, p_value: pValue });
      yield machine.advance({ stage: 'SummaryPending', summary: '' });

      let summary = '';
      for await (const content of gateway.stream(
        {
          systemPrompt: SUMMARY_PROMPT,
          userPrompt: summaryUserPrompt(hypothesis, record.description, success, pValue),
        },
        signal
      )) {
        summary = content;
        yield machine.advance({ stage: 'SummaryPending', summary });
      }

      yield machine.advance({ stage: 'Done', success, p_value: pValue, analysis, summary });
    } catch (error) {
      if (signal?.aborted || isAbortError(error)) {
        throw error;
      }
      const failed = machine.fail(error);
      logger.warn(`Hypothesis test failed at ${failed.failed_stage}: ${failed.error.message}`);
      yield failed;
    }
  }

  async *synthesize(
    records: HypothesisRecord[],
    gateway: CompletionClient,
    options: WorkflowOptions = {}
  ): AsyncGenerator<WorkflowEvent<string>, void, undefined> {
    const content = synthesisContent(records);
    if (content.length === 0) {
      throw new BadInputError('No tested hypotheses to synthesize');
    }
    const request = { systemPrompt: SYNTHESIS_PROMPT, userPrompt: content };

    if (!options.streaming) {
      yield { type: 'complete', result: await gateway.complete(request, options.signal) };
      return;
    }

    let synthesis = '';
    for await (const partial of gateway.stream(request, options.signal)) {
      synthesis = partial;
      yield { type: 'partial', content: partial };
    }
    yield { type: 'complete', result: synthesis };
  }
}
