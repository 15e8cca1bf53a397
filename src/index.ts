import * as dotenv from 'dotenv';
import { getLogger } from '@fluidware-it/saddlebag';
import { parseArgs, USAGE } from './cli/parser';
import { getConfig } from './config/config';
import { createClusterClients } from './cluster/k8sClient';
import { loadClusterSnapshot } from './cluster/snapshot';
import { ClusterCache } from './cache/clusterCache';
import { Collector } from './issues/collector';
import { Level } from './issues/issue';
import { DeploymentSanitizer } from './sanitize/deployment';
import { PodSanitizer } from './sanitize/pod';
import { buildReport, formatReport, reportMaxSeverity } from './utils/reportFormatter';

dotenv.config();

const logger = getLogger();

async function main(): Promise<number> {
  const args = parseArgs(process.argv.slice(2));
  if (args.help) {
    // eslint-disable-next-line no-console
    console.log(USAGE);
    return 0;
  }

  const config = getConfig();
  const namespace = args.namespace ?? config.namespace;

  logger.info('Starting workload-sanitizer');
  const clients = createClusterClients(args.context);
  const snapshot = await loadClusterSnapshot(clients, namespace);
  const cache = new ClusterCache(snapshot, config.sanitizer);

  // One collector per kind so the report can group resources by kind
  const deployments = new DeploymentSanitizer(new Collector(), cache);
  deployments.sanitize({ overAllocs: args.overAllocs });
  const pods = new PodSanitizer(new Collector(), cache);
  pods.sanitize();

  const report = buildReport(
    {
      context: clients.contextName,
      namespace: namespace ?? 'all namespaces',
      timestamp: new Date().toISOString(),
      outcomes: [
        { kind: 'Deployments', outcome: deployments.outcome() },
        { kind: 'Pods', outcome: pods.outcome() }
      ]
    },
    args.level
  );

  // eslint-disable-next-line no-console
  console.log(formatReport(report));

  return reportMaxSeverity(report) >= Level.Error ? 1 : 0;
}

main()
  .then(code => {
    process.exitCode = code;
  })
  .catch((e: unknown) => {
    logger.error(e instanceof Error ? e.message : String(e));
    process.exitCode = 1;
  });
