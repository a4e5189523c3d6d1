/**
 * Services
 *
 * Singleton wiring of the sync and categorization services. Controllers
 * and the entry point reach them through getServices(); tests swap parts
 * in with configureServices().
 */

import { config } from './config/env';
import { CategorizationPipeline } from './ai/categorization-pipeline';
import { OpenAIClassifier, StatisticalClassifier, type Classifier } from './ai/classifier';
import { FeedbackLearner } from './ai/feedback-learner';
import { SyncScheduler } from './automation/sync-scheduler';
import { AccountGateway } from './connectors/account-gateway';
import type { BankConnector } from './connectors/base-connector';
import { createConnector } from './connectors/connector-manager';
import { ConsentService } from './connectors/consent-service';
import { TokenManager } from './connectors/token-manager';
import { CategorizationWorker } from './jobs/categorization-worker';
import { EventChannel, type SyncEvent } from './sync/event-channel';
import { SyncOrchestrator } from './sync/sync-orchestrator';

export interface Services {
  connector: BankConnector;
  tokens: TokenManager;
  gateway: AccountGateway;
  consents: ConsentService;
  events: EventChannel<SyncEvent>;
  orchestrator: SyncOrchestrator;
  scheduler: SyncScheduler;
  classifier: Classifier;
  pipeline: CategorizationPipeline;
  learner: FeedbackLearner;
  worker: CategorizationWorker;
}

export interface ServiceOverrides {
  connector?: BankConnector;
  classifier?: Classifier;
  confidenceThreshold?: number;
  maxDurationMs?: number;
  channelCapacity?: number;
}

function createClassifier(): Classifier {
  const { classifier, openaiApiKey, openaiModel, timeoutMs } = config.categorization;
  if (classifier === 'openai') {
    if (!openaiApiKey) {
      console.error('[Services] CLASSIFIER=openai but OPENAI_API_KEY is not set; using the statistical classifier');
      return new StatisticalClassifier();
    }
    return new OpenAIClassifier({ apiKey: openaiApiKey, model: openaiModel, timeoutMs });
  }
  return new StatisticalClassifier();
}

export function createServices(overrides: ServiceOverrides = {}): Services {
  const connector = overrides.connector ?? createConnector();
  const tokens = new TokenManager(connector);
  const gateway = new AccountGateway(connector, tokens);
  const events = new EventChannel<SyncEvent>(overrides.channelCapacity ?? config.sync.channelCapacity);

  const orchestrator = new SyncOrchestrator({
    gateway,
    events,
    maxDurationMs: overrides.maxDurationMs ?? config.sync.maxDurationMs,
    defaultDaysBack: config.sync.daysBack
  });

  const classifier = overrides.classifier ?? createClassifier();
  const pipeline = new CategorizationPipeline({
    classifier,
    confidenceThreshold: overrides.confidenceThreshold ?? config.categorization.confidenceThreshold
  });

  return {
    connector,
    tokens,
    gateway,
    consents: new ConsentService(connector),
    events,
    orchestrator,
    scheduler: new SyncScheduler(orchestrator, {
      intervalMinutes: config.sync.intervalMinutes,
      concurrency: config.sync.concurrency,
      maxRetries: config.sync.maxRetries,
      retryBaseMs: config.sync.retryBaseMs
    }),
    classifier,
    pipeline,
    learner: new FeedbackLearner(),
    worker: new CategorizationWorker(events, pipeline)
  };
}

let services: Services | null = null;

export function getServices(): Services {
  if (!services) {
    services = createServices();
  }
  return services;
}

/**
 * Replaces the singleton. Stops the previous scheduler and closes its channel.
 */
export function configureServices(overrides: ServiceOverrides = {}): Services {
  if (services) {
    services.scheduler.stop();
    services.events.close();
  }
  services = createServices(overrides);
  return services;
}
