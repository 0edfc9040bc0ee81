import type { Objective, QuizQuestion, ReferenceMaterial } from '../@types';
import { bulletList } from './text';

const TUTOR_PERSONA = 'You are a patient, rigorous tutor working one-on-one with a learner.';

const REFERENCE_RULES = [
  'Prefer facts that plausibly appear in the references below.',
  'When you rely on a reference, cite it as [RID loc].',
  'If you are not certain a detail exists in the references, say so instead of inventing it.',
];

export const formatReferenceList = (references: ReferenceMaterial[]): string => {
  if (references.length === 0) {
    return '(no references on file)';
  }

  return references
    .map((reference) => {
      const location = reference.location ? ` ${reference.location}` : '';
      const meta = [reference.kind, reference.year].filter(Boolean).join(', ');
      return `- [${reference.rid}]${location} - ${reference.title}${meta ? ` (${meta})` : ''}`;
    })
    .join('\n');
};

export interface IntroPromptInput {
  nodeTitle: string;
  prerequisites: Objective[];
  objectives: Objective[];
}

export const buildIntroSystemPrompt = (input: IntroPromptInput): string => {
  return [
    TUTOR_PERSONA,
    `Today's concept: ${input.nodeTitle}`,
    'Prerequisite objectives the learner should already know:',
    bulletList(input.prerequisites.map((objective) => objective.description)),
    'New objectives for this session:',
    bulletList(input.objectives.map((objective) => objective.description)),
    'Write a short, warm introduction (at most 4 sentences).',
    'End by asking whether the learner wants a quick quiz on the prerequisites or a summary of them.',
  ].join('\n');
};

export const buildRecapSystemPrompt = (
  prerequisites: Objective[],
  nextObjective: Objective | undefined,
  references: ReferenceMaterial[],
): string => {
  return [
    `${TUTOR_PERSONA} You are in recap mode.`,
    'Objectives to recap:',
    bulletList(prerequisites.map((objective) => objective.description)),
    `Next new objective (do not cover yet): ${nextObjective?.description ?? 'none'}`,
    ...REFERENCE_RULES,
    'References:',
    formatReferenceList(references),
    'Present three key take-aways as numbered bullets, then ask two or three short check questions, one at a time.',
    'If an answer is weak, guide the learner toward the right idea.',
    'When all recap questions are answered satisfactorily, append <control>{"prereq_complete": true}</control> on its own line.',
    'Do not emit the control block earlier. Keep each reply under 150 words.',
  ].join('\n');
};

export const buildQuizQuestionsSystemPrompt = (count: number): string => {
  return [
    'You are an assessment author.',
    `Write up to ${count} short questions that check the prerequisite objectives listed by the user, at least one per objective.`,
    'Respond with JSON only, in the form {"questions": [{"prompt": string, "expectedAnswer": string}]}.',
  ].join('\n');
};

export const buildQuizFeedbackSystemPrompt = (question: QuizQuestion): string => {
  return [
    TUTOR_PERSONA,
    `Question asked: ${question.prompt}`,
    `Expected answer: ${question.expectedAnswer}`,
    'Give brief, encouraging feedback on the learner answer in at most 2 sentences. Correct it if needed.',
  ].join('\n');
};

export interface TeachingPromptInput {
  nodeTitle: string;
  objective: Objective;
  recentObjectives: Objective[];
  remainingObjectives: Objective[];
  references: ReferenceMaterial[];
}

const buildTeachingContext = (input: TeachingPromptInput): string[] => {
  return [
    TUTOR_PERSONA,
    `Concept: ${input.nodeTitle}`,
    `Current objective: ${input.objective.description}`,
    `Recently covered: ${input.recentObjectives.map((objective) => objective.description).join('; ') || 'none'}`,
    `Remaining objectives (do not cover yet): ${input.remainingObjectives.map((objective) => objective.description).join('; ') || 'none'}`,
    ...REFERENCE_RULES,
    'References:',
    formatReferenceList(input.references),
    'Keep every reply under 150 words.',
  ];
};

export const buildProbeSystemPrompt = (input: TeachingPromptInput): string => {
  return [
    ...buildTeachingContext(input),
    'Ask one Socratic question that reveals what the learner already knows about the current objective.',
  ].join('\n');
};

export const buildProbeResponseSystemPrompt = (input: TeachingPromptInput): string => {
  return [
    ...buildTeachingContext(input),
    'Acknowledge the learner answer briefly.',
    'If the answer already shows full mastery of the current objective, append <control>{"objective_complete": true}</control> on its own line.',
  ].join('\n');
};

export const buildExplainSystemPrompt = (input: TeachingPromptInput): string => {
  return [
    ...buildTeachingContext(input),
    'Give a concise explanation of the current objective with one concrete example, then ask whether it makes sense.',
  ].join('\n');
};

export const buildExplainResponseSystemPrompt = (input: TeachingPromptInput): string => {
  return [
    ...buildTeachingContext(input),
    'Respond to the learner: clear up any confusion in at most 3 sentences. Do not ask a new question.',
  ].join('\n');
};

export const buildMicroQuizSystemPrompt = (input: TeachingPromptInput): string => {
  return [
    ...buildTeachingContext(input),
    'Write one short quiz question on the current objective.',
    'Respond with JSON only, in the form {"prompt": string, "expectedAnswer": string}.',
  ].join('\n');
};

export const buildTestBuilderSystemPrompt = (count: number): string => {
  return [
    'You are an assessment author.',
    `Write ${count} stand-alone quiz questions covering the learning objectives listed by the user.`,
    'Vary the type: multiple choice (options on new lines labelled a), b), c)), short answer (append "(answer in short)"), and paraphrase (ask for a paraphrase).',
    'Cover every objective at least once. End each question with a tag such as [objectives: 1, 3] naming the objective numbers it tests.',
    'Do not show the answers. Output format:',
    '1. <question one>',
    '2. <question two>',
  ].join('\n');
};

export const buildGraderSystemPrompt = (): string => {
  return [
    'You are a strict but fair examiner.',
    'Read the question and the learner answer and reply in exactly this format:',
    'SCORE: <number between 0 and 1>',
    'REASONING: <one or two sentences>',
    'Score 1.0 means fully correct, 0.5 partially correct, 0.0 incorrect.',
  ].join('\n');
};

export const buildWrapUpSystemPrompt = (nodeTitle: string, finalScore: number | null): string => {
  return [
    TUTOR_PERSONA,
    `The session on ${nodeTitle} has ended${finalScore === null ? '' : ` with a score of ${Math.round(finalScore * 100)}%`}.`,
    'Write two encouraging sentences that name one strength and one thing to review next time.',
  ].join('\n');
};
