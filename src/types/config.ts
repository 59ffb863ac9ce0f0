/** Configuration types for the layered config system (base.yaml ← <env>.yaml ← TRAINCTL_*). */

export type SelectionConfig = {
  allow_full_retrain_without_baseline: boolean;
};

export type SubmissionConfig = {
  max_in_flight: number;
  /** One entry per extra attempt; its length is the retry budget. */
  retry_delays_seconds: number[];
};

export type MonitorConfig = {
  initial_interval_seconds: number;
  max_interval_seconds: number;
  max_wait_seconds: number;
  heartbeat_seconds: number;
};

export type RetryConfig = {
  enabled: boolean;
  approval_timeout_seconds: number;
};

export type RegistrationConfig = {
  min_success_ratio: number;
};

export type VisibilityConfig = {
  initial_ms: number;
  max_ms: number;
  ceiling_ms: number;
};

export type PromotionConfig = {
  approval_timeout_hours: number;
  visibility: VisibilityConfig;
};

export type ExecutionConfig = {
  submit: string[];
  status: string[];
  cancel: string[];
};

export type StoresConfig = {
  training: string;
  shared: string;
};

export type LineageConfig = {
  exclude_keys: string[];
};

export type TrainctlConfig = {
  schema_version: string;
  environment: string;
  units_file: string;
  state_dir: string;
  approvals_dir: string;
  stores: StoresConfig;
  selection: SelectionConfig;
  submission: SubmissionConfig;
  monitor: MonitorConfig;
  retry: RetryConfig;
  registration: RegistrationConfig;
  promotion: PromotionConfig;
  execution: ExecutionConfig;
  lineage: LineageConfig;
};
