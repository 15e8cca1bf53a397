// Pod metrics as served by metrics-server. Structurally compatible with the
// PodMetric type of @kubernetes/client-node so its responses can be passed as is.

export interface ContainerUsage {
  name: string;
  usage: {
    cpu: string;
    memory: string;
  };
}

export interface PodMetricsSnapshot {
  metadata: {
    name?: string | undefined;
    namespace?: string | undefined;
  };
  containers: ContainerUsage[];
}

// Current usage of one container, in millicores and bytes
export interface Metrics {
  currentCPU: number;
  currentMEM: number;
}

// container name -> usage
export type ContainerMetrics = Map<string, Metrics>;

// pod FQN -> container usage
export type PodsMetrics = Map<string, ContainerMetrics>;
