import { env } from '../config/env';
import { AppDataSource } from '../database/data-source';
import { createEngineContext } from './engine/context';
import { TypeOrmKnowledgeStore } from './knowledge/typeormKnowledgeStore';
import { StructuredSessionLog } from './logging/sessionLog';
import { SessionMemory } from './memory/sessionMemory';
import { TutoringOrchestrator } from './orchestrator';
import { sessionRealtimeBus } from './realtime/sessionRealtimeBus';
import { createLlmTool } from './tools/llm';

export const knowledgeStore = new TypeOrmKnowledgeStore(AppDataSource);

const llmTool = createLlmTool({
  openAiApiKey: env.OPENAI_API_KEY,
  azureApiKey: env.AZURE_OPENAI_API_KEY,
  azureEndpoint: env.AZURE_OPENAI_ENDPOINT,
  azureDeployment: env.AZURE_OPENAI_DEPLOYMENT,
  model: env.LLM_MODEL,
  timeoutMs: env.LLM_TIMEOUT_MS,
  maxRetries: env.LLM_MAX_RETRIES,
});

const engineContext = createEngineContext({
  llm: llmTool,
  knowledgeStore,
  sessionLog: new StructuredSessionLog(sessionRealtimeBus),
  settings: {
    tickLimit: env.SESSION_TICK_LIMIT,
    finalTestQuestionCount: env.FINAL_TEST_QUESTION_COUNT,
    prerequisiteQuizQuestionCount: env.PREREQUISITE_QUIZ_QUESTION_COUNT,
  },
});

export const orchestrator = new TutoringOrchestrator(new SessionMemory(), engineContext, sessionRealtimeBus);
