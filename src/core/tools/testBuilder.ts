import type { Objective, QuestionType, QuizQuestion } from '../@types';
import { buildTestBuilderSystemPrompt } from '../shared/prompts';
import { bulletList, normalizeWhitespace, significantWords } from '../shared/text';
import type { LlmTool } from './llm';

export const GENERIC_REFLECTION_QUESTIONS: ReadonlyArray<string> = [
  'Can you explain the main concept we covered today in your own words?',
  'What was the most important thing you learned in this session?',
  'How would you apply what you learned to a real-world scenario?',
];

const NUMBERED_LINE = /^\s*(\d+)[.)]\s+(.*)$/;
const CHOICE_LINE = /^\s*\(?([a-h])[.)]\s+(.*)$/i;
const OBJECTIVE_TAG = /\[\s*objectives?\s*:\s*([\d,\s]*)\]/i;
const SHORT_ANSWER_MARKER = /\(answer in short\)/i;
const PARAPHRASE_MARKER = /paraphras/i;
const OVERLAP_WORDS = 4;

const MIN_CHOICES = 2;

interface RawQuestion {
  lines: string[];
  choices: string[];
}

interface OptionRun {
  raw: string[];
  choices: string[];
}

/** Option lines count as choices only in runs of at least two; a lone one is prompt text. */
const flushOptionRun = (question: RawQuestion | null, run: OptionRun): void => {
  if (question && run.raw.length > 0) {
    if (run.choices.length >= MIN_CHOICES) {
      question.choices.push(...run.choices);
    } else {
      question.lines.push(...run.raw);
    }
  }

  run.raw = [];
  run.choices = [];
};

const collectNumberedQuestions = (text: string): RawQuestion[] => {
  const questions: RawQuestion[] = [];
  const run: OptionRun = { raw: [], choices: [] };
  let current: RawQuestion | null = null;

  for (const line of text.split('\n')) {
    const numbered = NUMBERED_LINE.exec(line);
    if (numbered) {
      flushOptionRun(current, run);
      current = { lines: [numbered[2] ?? ''], choices: [] };
      questions.push(current);
      continue;
    }

    if (!current || line.trim().length === 0) {
      continue;
    }

    const choice = CHOICE_LINE.exec(line);
    if (choice) {
      run.raw.push(line.trim());
      run.choices.push(`${(choice[1] ?? '').toLowerCase()}) ${(choice[2] ?? '').trim()}`);
      continue;
    }

    flushOptionRun(current, run);
    current.lines.push(line.trim());
  }

  flushOptionRun(current, run);
  return questions.filter((question) => question.lines.join(' ').trim().length > 0);
};

const classifyQuestion = (prompt: string, choices: string[]): QuestionType => {
  if (choices.length >= 2) {
    return 'multiple_choice';
  }

  if (SHORT_ANSWER_MARKER.test(prompt)) {
    return 'short_answer';
  }

  if (PARAPHRASE_MARKER.test(prompt)) {
    return 'paraphrase';
  }

  return 'free_response';
};

const readObjectiveTag = (prompt: string, objectives: Objective[]): { prompt: string; ids: string[] | null } => {
  const tag = OBJECTIVE_TAG.exec(prompt);
  if (!tag) {
    return { prompt, ids: null };
  }

  const ids = (tag[1] ?? '')
    .split(',')
    .map((value) => Number.parseInt(value.trim(), 10))
    .filter((position) => Number.isInteger(position) && position >= 1 && position <= objectives.length)
    .map((position) => objectives[position - 1]?.id)
    .filter((id): id is string => typeof id === 'string');

  return {
    prompt: normalizeWhitespace(prompt.replace(OBJECTIVE_TAG, '')),
    ids: ids.length > 0 ? [...new Set(ids)] : null,
  };
};

const bestOverlap = (prompt: string, objectives: Objective[]): Objective | undefined => {
  const promptWords = new Set(significantWords(prompt));
  let best: Objective | undefined;
  let bestScore = 0;

  for (const objective of objectives) {
    const score = significantWords(objective.description)
      .slice(0, OVERLAP_WORDS)
      .filter((word) => promptWords.has(word)).length;

    if (score > bestScore) {
      best = objective;
      bestScore = score;
    }
  }

  return best;
};

const leastCovered = (objectives: Objective[], coverage: Map<string, number>): Objective | undefined => {
  let best: Objective | undefined;

  for (const objective of objectives) {
    if (!best || (coverage.get(objective.id) ?? 0) < (coverage.get(best.id) ?? 0)) {
      best = objective;
    }
  }

  return best;
};

/**
 * Turns the free-text answer of the test author into questions. Objective ids
 * come from an explicit `[objectives: …]` tag, then from word overlap with the
 * objective descriptions, then from whichever objective has the fewest questions.
 */
export const parseTestQuestions = (
  text: string,
  objectives: Objective[],
  maxQuestions: number,
): QuizQuestion[] => {
  const trimmed = text.trim();
  const coverage = new Map<string, number>();

  let raw: RawQuestion[];
  if (!trimmed) {
    raw = GENERIC_REFLECTION_QUESTIONS.map((question) => ({ lines: [question], choices: [] }));
  } else {
    raw = collectNumberedQuestions(trimmed);
    if (raw.length === 0) {
      raw = [{ lines: [trimmed], choices: [] }];
    }
  }

  return raw.slice(0, maxQuestions).map((question) => {
    const tagged = readObjectiveTag(normalizeWhitespace(question.lines.join(' ')), objectives);
    const matched = tagged.ids ? null : bestOverlap(tagged.prompt, objectives) ?? leastCovered(objectives, coverage);
    const objectiveIds = tagged.ids ?? (matched ? [matched.id] : []);

    for (const id of objectiveIds) {
      coverage.set(id, (coverage.get(id) ?? 0) + 1);
    }

    const built: QuizQuestion = {
      prompt: tagged.prompt,
      type: classifyQuestion(tagged.prompt, question.choices),
      expectedAnswer: '',
      objectiveIds,
    };

    if (question.choices.length > 0) {
      built.choices = question.choices;
    }

    return built;
  });
};

export interface BuiltTest {
  questions: QuizQuestion[];
  rawText: string;
  model: string;
}

export const buildFinalTest = async (
  llm: LlmTool,
  objectives: Objective[],
  questionCount: number,
): Promise<BuiltTest> => {
  const request = [
    'Learning objectives (numbered in this order):',
    bulletList(objectives.map((objective) => objective.description)),
  ].join('\n');

  const response = await llm.invoke(
    buildTestBuilderSystemPrompt(questionCount),
    [{ role: 'user', content: request }],
    { purpose: 'test_builder', temperature: 0.4, maxTokens: 900 },
  );

  return {
    questions: parseTestQuestions(response.text, objectives, questionCount),
    rawText: response.text,
    model: response.model,
  };
};

export const formatTestQuestion = (question: QuizQuestion, index: number, total: number): string => {
  const choices = question.choices && question.choices.length > 0 ? `\n${question.choices.join('\n')}` : '';
  return `**Question ${index + 1}/${total}:**\n\n${question.prompt}${choices}`;
};
