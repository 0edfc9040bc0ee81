import type { ChatMessage, InvokeOptions, InvokeResult, LlmPurpose, LlmTool } from '../../../src/core/tools/llm';

export interface RecordedCall {
  systemPrompt: string;
  history: ChatMessage[];
  options: InvokeOptions;
}

export type ScriptedReply = string | Error | ((call: RecordedCall) => string);

const listedItems = (call: RecordedCall): string[] => {
  return (call.history[0]?.content ?? '')
    .split('\n')
    .filter((line) => line.startsWith('- '))
    .map((line) => line.slice(2));
};

export const DEFAULT_REPLIES: Record<LlmPurpose, ScriptedReply> = {
  intro: 'Welcome! Shall we start with a quick quiz or a summary of the prerequisites?',
  prerequisite_quiz_questions:
    '{"questions": [{"prompt": "What does a stack store?", "expectedAnswer": "Frames."}]}',
  prerequisite_quiz_feedback: 'Good answer.',
  recap: 'Here is a short recap.',
  probe: 'What do you already know about this?',
  probe_response: 'Thanks for sharing.',
  explain: 'Here is the idea with an example. Does that make sense?',
  explain_response: 'Glad that helps.',
  micro_quiz_question: '{"prompt": "Quick question?", "expectedAnswer": "A short answer."}',
  micro_quiz_feedback: 'Nice work.',
  test_builder: (call) =>
    listedItems(call)
      .map((item, index) => `${index + 1}. Explain ${item} [objectives: ${index + 1}]`)
      .join('\n'),
  grader: 'SCORE: 0.8\nREASONING: Mostly correct.',
  wrap_up: 'Keep going.',
};

/** Replies per purpose from a queue, falling back to DEFAULT_REPLIES. An Error reply is thrown. */
export class ScriptedLlmTool implements LlmTool {
  public readonly calls: RecordedCall[] = [];
  private readonly queues = new Map<LlmPurpose, ScriptedReply[]>();

  public enqueue(purpose: LlmPurpose, ...replies: ScriptedReply[]): this {
    this.queues.set(purpose, [...(this.queues.get(purpose) ?? []), ...replies]);
    return this;
  }

  public callsFor(purpose: LlmPurpose): RecordedCall[] {
    return this.calls.filter((call) => call.options.purpose === purpose);
  }

  public invoke(systemPrompt: string, history: ChatMessage[], options: InvokeOptions): Promise<InvokeResult> {
    const call: RecordedCall = { systemPrompt, history: [...history], options };
    this.calls.push(call);

    const reply = this.queues.get(options.purpose)?.shift() ?? DEFAULT_REPLIES[options.purpose];
    if (reply instanceof Error) {
      return Promise.reject(reply);
    }

    const text = typeof reply === 'function' ? reply(call) : reply;
    return Promise.resolve({ text, model: 'scripted-test-model', provider: 'mock' });
  }
}
