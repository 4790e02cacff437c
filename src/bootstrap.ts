import { CloudWatchLogsClient } from '@aws-sdk/client-cloudwatch-logs';
import { SecretsManagerClient } from '@aws-sdk/client-secrets-manager';
import { loadConfig, type AppConfig } from './config/index.js';
import { pgConnector, type DatabaseConnector } from './db/client.js';
import { ConnectivityProbe } from './services/connectivityProbe.js';
import { LogStreamManager } from './services/logStreamManager.js';
import { ProbeOrchestrator } from './services/probeOrchestrator.js';
import { SecretResolver } from './services/secretResolver.js';
import { getLogger } from './utils/logging.js';

export interface ProcessClients {
  secretsManager: SecretsManagerClient;
  cloudWatchLogs: CloudWatchLogsClient;
  connector: DatabaseConnector;
}

// Built once per process; the SDK clients are stateless and safe to share across invocations.
export function createClients(cfg: AppConfig): ProcessClients {
  const region = cfg.aws.region;
  return {
    secretsManager: new SecretsManagerClient(region ? { region } : {}),
    cloudWatchLogs: new CloudWatchLogsClient(region ? { region } : {}),
    connector: pgConnector,
  };
}

export function createOrchestrator(
  cfg: AppConfig = loadConfig(),
  clients: ProcessClients = createClients(cfg),
): ProbeOrchestrator {
  const logger = getLogger();
  return new ProbeOrchestrator({
    secretId: cfg.probe.secretId,
    logStreams: new LogStreamManager(clients.cloudWatchLogs, { ...cfg.logStream, logger }),
    secrets: new SecretResolver(clients.secretsManager, logger),
    probe: new ConnectivityProbe(clients.connector, {
      connectTimeoutMs: cfg.probe.connectTimeoutMs,
    }),
    logger,
  });
}

let orchestrator: ProbeOrchestrator | undefined;

export function getOrchestrator(): ProbeOrchestrator {
  if (!orchestrator) {
    orchestrator = createOrchestrator();
  }
  return orchestrator;
}
