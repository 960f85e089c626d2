import type { StageName } from '@ledger-auditor/shared';
import type { ChatModel } from '../llm';
import { AUDIT_ASSISTANT_SYSTEM_PROMPT, INSUFFICIENT_INFORMATION_MESSAGE } from '../prompts/system';
import { createLogger, type Logger } from '../../utils/logger';

export type RouteCharacterization = 'hybrid' | 'direct database' | 'document search';

export interface SynthesisInput {
  query: string;
  structuredResult: string;
  documentContext: string;
  /** Stages visited, including the answer stage itself */
  routeTrace: StageName[];
}

export interface SynthesisOutput {
  /** Banner + body: what the assistant turn contains */
  content: string;
  body: string;
  usedModel: boolean;
}

export function characterizeRoute(trace: readonly StageName[]): RouteCharacterization {
  const structured = trace.includes('query_sql');
  const documents = trace.includes('query_rag');
  if (structured && documents) return 'hybrid';
  if (structured) return 'direct database';
  return 'document search';
}

export function buildRouteBanner(trace: readonly StageName[]): string {
  return [`Route: ${trace.join(' → ')}`, `Strategy: ${characterizeRoute(trace)}`].join('\n');
}

/**
 * Banner, then whichever evidence sections are non-empty, structured first
 */
export function buildContextBlock(input: Omit<SynthesisInput, 'query'>): string {
  const sections = [buildRouteBanner(input.routeTrace)];
  if (input.structuredResult) {
    sections.push(`Structured results:\n${input.structuredResult}`);
  }
  if (input.documentContext) {
    sections.push(`Retrieved documents:\n${input.documentContext}`);
  }
  return sections.join('\n\n');
}

export class AnswerSynthesizer {
  private logger: Logger;

  constructor(
    private model: ChatModel | null,
    private options: { maxDocumentContextChars: number } = { maxDocumentContextChars: 500 },
    logger?: Logger
  ) {
    this.logger = logger ?? createLogger('AnswerSynthesizer');
  }

  async synthesize(input: SynthesisInput): Promise<SynthesisOutput> {
    const banner = buildRouteBanner(input.routeTrace);
    const generated = await this.generateWithModel(input);
    const body = generated || this.buildFallback(input);
    return {
      content: `${banner}\n\n${body}`,
      body,
      usedModel: generated.length > 0,
    };
  }

  /**
   * Deterministic answer: structured result, else the head of the documents,
   * else a fixed sentence
   */
  buildFallback(input: Pick<SynthesisInput, 'structuredResult' | 'documentContext'>): string {
    if (input.structuredResult) {
      return input.structuredResult;
    }
    if (input.documentContext) {
      // Cut by code point so a surrogate pair is never split
      return Array.from(input.documentContext).slice(0, this.options.maxDocumentContextChars).join('');
    }
    return INSUFFICIENT_INFORMATION_MESSAGE;
  }

  private async generateWithModel(input: SynthesisInput): Promise<string> {
    if (!this.model) return '';

    const user = [
      `User question: ${input.query}`,
      '',
      'Context:',
      buildContextBlock(input),
    ].join('\n');

    try {
      const response = await this.model.chat([
        { role: 'system', content: AUDIT_ASSISTANT_SYSTEM_PROMPT },
        { role: 'user', content: user },
      ]);
      return (response.content ?? '').trim();
    } catch (error) {
      this.logger.error('Model call failed, answering from context:', error);
      return '';
    }
  }
}
