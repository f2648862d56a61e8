export const SIMKUBE_NAMESPACE = 'simkube';
export const CLUSTER_ADMIN_ROLE = 'cluster-admin';

// Node labels of the local kind test cluster
export const KIND_WORKER_SELECTOR = { type: 'kind-worker' } as const;
export const KIND_CONTROL_PLANE_SELECTOR = { type: 'kind-control-plane' } as const;
export const VIRTUAL_NODE_SELECTOR = { type: 'virtual' } as const;

export const RUST_BACKTRACE_ENV = { RUST_BACKTRACE: { value: '1' } } as const;
