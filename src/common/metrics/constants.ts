export const CHECKOUT_METRIC_ORDERS_TOTAL = 'checkout_orders_total';
export const CHECKOUT_METRIC_LATENCY_SECONDS = 'checkout_latency_seconds';
export const CHECKOUT_METRIC_STEP_CALLS_TOTAL = 'checkout_step_calls_total';
export const CHECKOUT_METRIC_STEP_LATENCY_SECONDS = 'checkout_step_latency_seconds';
export const CHECKOUT_METRIC_BACKGROUND_TASKS_TOTAL = 'checkout_background_tasks_total';

export const CHECKOUT_LATENCY_BUCKETS = [0.05, 0.1, 0.25, 0.5, 1, 2, 5, 10] as const;
export const STEP_LATENCY_BUCKETS = [0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 3] as const;

export const HOST_METRIC_TARGET_INFO = 'target_info';
export const HOST_METRIC_LOAD_AVERAGE = 'system_cpu_load_average';
export const HOST_METRIC_CPU_TIME_SECONDS_TOTAL = 'system_cpu_time_seconds_total';
