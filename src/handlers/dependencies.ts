/**
 * Engine wiring shared by the scheduled handlers.
 * Built once per Lambda container from validated configuration.
 */

import { SNSClient } from '@aws-sdk/client-sns';
import { GroomingConfig, loadGroomingConfig } from '../config/grooming';
import { docClient } from '../lib/dynamodb';
import { KeyedLock } from '../lib/keyedLock';
import { DynamoGroomingStore } from '../models/groomingStore';
import { AlertAuditor } from '../services/alertAuditor';
import { NotificationSender } from '../services/delivery/notificationSender';
import { SnsPublisher, TopicPublisher } from '../services/delivery/snsPublisher';
import { ReportFetcher } from '../services/fetch/reportFetcher';
import { GroomingCycle } from '../services/groomingCycle';
import { NotificationGate } from '../services/notificationGate';
import { RarityFilter } from '../services/rarityFilter';
import { ReportReconciler } from '../services/reportReconciler';
import type { GroomingStore } from '../types/grooming';

export interface GroomingEngine {
  config: GroomingConfig;
  store: GroomingStore;
  reconciler: ReportReconciler;
  gate: NotificationGate;
  auditor: AlertAuditor;
  sender: NotificationSender;
  cycle: GroomingCycle;
}

export interface GroomingEngineOverrides {
  store?: GroomingStore;
  publisher?: TopicPublisher;
  fetcher?: ReportFetcher;
}

export function createGroomingEngine(
  config: GroomingConfig,
  overrides: GroomingEngineOverrides = {}
): GroomingEngine {
  const store =
    overrides.store ?? new DynamoGroomingStore(docClient, config.tableName, config.defaultTimezone);
  const publisher = overrides.publisher ?? new SnsPublisher(new SNSClient({ region: config.region }));
  const fetcher = overrides.fetcher ?? new ReportFetcher({ timeoutMs: config.fetchTimeoutMs });

  const rarityFilter = new RarityFilter(store, {
    threshold: config.rarityThreshold,
    windowDays: config.rarityWindowDays,
  });
  const reconciler = new ReportReconciler(
    store,
    rarityFilter,
    { noRunsNotifHour: config.noRunsNotifHour },
    new KeyedLock()
  );
  const gate = new NotificationGate(store, { noRunsNotifHour: config.noRunsNotifHour });
  const auditor = new AlertAuditor(store, reconciler, {
    noRunsNotifHour: config.noRunsNotifHour,
    alertNotifMinute: config.alertNotifMinute,
  });
  const sender = new NotificationSender(store, publisher, {
    reportSiteUrl: config.reportSiteUrl,
    alertTopicArn: config.alertTopicArn,
  });
  const cycle = new GroomingCycle({ store, fetcher, reconciler, gate, sender });

  return { config, store, reconciler, gate, auditor, sender, cycle };
}

let engine: GroomingEngine | null = null;

/**
 * Container-scoped engine; configuration errors surface on first invocation
 */
export function getGroomingEngine(): GroomingEngine {
  if (!engine) {
    engine = createGroomingEngine(loadGroomingConfig());
  }
  return engine;
}
