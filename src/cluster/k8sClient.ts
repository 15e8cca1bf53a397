import * as k8s from '@kubernetes/client-node';
import { getLogger } from '@fluidware-it/saddlebag';

export interface ClusterClients {
  contextName: string;
  appsApi: k8s.AppsV1Api;
  coreApi: k8s.CoreV1Api;
  metricsClient: k8s.Metrics;
}

// Builds API clients from the default kubeconfig, switching to the given context when set
export function createClusterClients(context?: string): ClusterClients {
  const kc = new k8s.KubeConfig();
  try {
    kc.loadFromDefault();
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    getLogger().error(`Failed to load Kubernetes configuration: ${message}`);
    throw new Error(`Kubernetes configuration error: ${message}`);
  }

  if (context) {
    const available = kc.getContexts().map(c => c.name);
    if (!available.includes(context)) {
      throw new Error(`Context "${context}" not found. Available contexts: ${available.join(', ')}`);
    }
    kc.setCurrentContext(context);
  }
  getLogger().info(`K8s context loaded: ${kc.getCurrentContext()}`);

  return {
    contextName: kc.getCurrentContext(),
    appsApi: kc.makeApiClient(k8s.AppsV1Api),
    coreApi: kc.makeApiClient(k8s.CoreV1Api),
    metricsClient: new k8s.Metrics(kc)
  };
}
