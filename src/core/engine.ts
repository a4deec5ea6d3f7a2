import type pino from 'pino';
import { loadLlmConfig, type LlmConfig } from '../config/llm.js';
import { loadPlannerConfig, type PlannerConfig } from '../config/planner.js';
import { loadProviderBreakerConfig, type ProviderBreakerConfig } from '../config/resilience.js';
import { loadStoreConfig } from '../config/store.js';
import { createDefaultAdapters } from '../providers/registry.js';
import type { AdapterSet } from '../providers/types.js';
import type { ComposePolicy } from './assemble.js';
import { TemplateComposer, type PlanComposer } from './composer.js';
import { ContextStore } from './context_store.js';
import { ConversationService } from './conversation.js';
import { FallbackSynthesizer } from './fallback.js';
import { DataGatheringCoordinator } from './gather.js';
import { LlmPlanComposer, LlmSlotExtractor, OpenAiCompatibleClient, type LlmClient } from './llm.js';
import { ItineraryPlanner } from './planner.js';
import { ProgressPublisher } from './progress.js';
import { ReplanCoordinator } from './replan.js';
import { TaskRunner } from './runner.js';
import { HeuristicSlotExtractor, type SlotExtractor } from './slot_parser.js';
import { createStorage, type PlannerStorage } from './storage.js';
import { TaskStateMachine } from './task_machine.js';
import { VersionRepository } from './versions.js';

export interface EngineOptions {
  log: pino.Logger;
  cfg?: PlannerConfig;
  storage?: PlannerStorage;
  adapters?: AdapterSet;
  breaker?: ProviderBreakerConfig;
  /** Replaces the LLM client built from the environment. */
  llm?: LlmClient | null;
  composer?: PlanComposer;
  extractor?: SlotExtractor;
  now?: () => Date;
}

/** Every core service, wired together once per process. */
export interface Engine {
  cfg: PlannerConfig;
  storage: PlannerStorage;
  contexts: ContextStore;
  progress: ProgressPublisher;
  tasks: TaskStateMachine;
  runner: TaskRunner;
  gatherer: DataGatheringCoordinator;
  versions: VersionRepository;
  planner: ItineraryPlanner;
  replanner: ReplanCoordinator;
  conversations: ConversationService;
  close(): Promise<void>;
}

function llmFromEnv(log: pino.Logger): LlmClient | null {
  const cfg: LlmConfig | undefined = loadLlmConfig();
  if (!cfg) return null;
  log.info({ model: cfg.model }, 'engine:llm_enabled');
  return new OpenAiCompatibleClient(cfg, log);
}

export function createEngine(opts: EngineOptions): Engine {
  const { log } = opts;
  const cfg = opts.cfg ?? loadPlannerConfig();
  const now = opts.now ?? (() => new Date());
  const storage = opts.storage ?? createStorage(loadStoreConfig(), log);
  const llm = opts.llm === undefined ? llmFromEnv(log) : opts.llm;

  const template = new TemplateComposer();
  const heuristic = new HeuristicSlotExtractor();
  const composer = opts.composer ?? (llm ? new LlmPlanComposer(llm, log.child({ component: 'composer' })) : template);
  const extractor =
    opts.extractor ?? (llm ? new LlmSlotExtractor(llm, heuristic, log.child({ component: 'extractor' })) : heuristic);
  const compose: ComposePolicy = {
    primary: composer,
    template,
    fallbackPlan: cfg.composeFallbackPlan,
    log: log.child({ component: 'compose' }),
  };

  const contexts = new ContextStore({
    storage,
    log: log.child({ component: 'context' }),
    lockConfidence: cfg.contextLockConfidence,
    now,
  });
  const progress = new ProgressPublisher(storage, log.child({ component: 'progress' }));
  const tasks = new TaskStateMachine(progress, log.child({ component: 'tasks' }), now);
  const runner = new TaskRunner(tasks, progress, cfg, log.child({ component: 'runner' }));
  const gatherer = new DataGatheringCoordinator({
    adapters: opts.adapters ?? createDefaultAdapters(cfg),
    synthesizer: new FallbackSynthesizer(),
    timeoutsMs: cfg.providerTimeoutsMs,
    maxConcurrency: cfg.gatherMaxConcurrency,
    breaker: opts.breaker ?? loadProviderBreakerConfig(),
    log: log.child({ component: 'gather' }),
  });
  const versions = new VersionRepository(storage, log.child({ component: 'versions' }), now);
  const planner = new ItineraryPlanner({
    cfg,
    contexts,
    runner,
    gatherer,
    compose,
    versions,
    log: log.child({ component: 'planner' }),
    now,
  });
  const replanner = new ReplanCoordinator({
    contexts,
    runner,
    gatherer,
    compose,
    versions,
    log: log.child({ component: 'replan' }),
  });
  const conversations = new ConversationService({
    cfg,
    contexts,
    extractor,
    planner,
    replanner,
    progress,
    log: log.child({ component: 'conversation' }),
    now,
  });

  return {
    cfg,
    storage,
    contexts,
    progress,
    tasks,
    runner,
    gatherer,
    versions,
    planner,
    replanner,
    conversations,
    async close() {
      await runner.close();
      await storage.close();
    },
  };
}
