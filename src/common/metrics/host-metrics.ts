import { cpus, loadavg } from 'node:os';
import type { ServiceResource } from '../observability/service-resource';
import {
  HOST_METRIC_CPU_TIME_SECONDS_TOTAL,
  HOST_METRIC_LOAD_AVERAGE,
  HOST_METRIC_TARGET_INFO,
} from './constants';

export interface HostSample {
  /** 1, 5 and 15 minute load averages. */
  loadAverage: readonly [number, number, number];
  cpuUserSeconds: number;
  cpuSystemSeconds: number;
  uptimeSeconds: number;
  cpuCount: number;
}

export function sampleHost(): HostSample {
  const [oneMinute = 0, fiveMinutes = 0, fifteenMinutes = 0] = loadavg();
  const usage = process.cpuUsage();

  return {
    loadAverage: [oneMinute, fiveMinutes, fifteenMinutes],
    cpuUserSeconds: usage.user / 1e6,
    cpuSystemSeconds: usage.system / 1e6,
    uptimeSeconds: process.uptime(),
    cpuCount: Math.max(1, cpus().length),
  };
}

/**
 * Resource info, load averages and process CPU time by state. Idle time is
 * what the process left unused of the wall-clock time across all cores.
 */
export function renderHostMetrics(resource: ServiceResource, sample: HostSample): string {
  const lines: string[] = [];

  lines.push(`# HELP ${HOST_METRIC_TARGET_INFO} Service resource attributes.`);
  lines.push(`# TYPE ${HOST_METRIC_TARGET_INFO} gauge`);
  lines.push(
    `${HOST_METRIC_TARGET_INFO}{service_name="${escapeLabelValue(resource.serviceName)}",` +
      `service_version="${escapeLabelValue(resource.serviceVersion)}",` +
      `deployment_environment="${escapeLabelValue(resource.environment)}",` +
      `host_name="${escapeLabelValue(resource.hostName)}",` +
      `os_type="${escapeLabelValue(resource.osType)}"} 1`,
  );

  const windows = ['1m', '5m', '15m'] as const;
  windows.forEach((window, index) => {
    const name = `${HOST_METRIC_LOAD_AVERAGE}_${window}`;
    lines.push(`# HELP ${name} ${window} CPU load average.`);
    lines.push(`# TYPE ${name} gauge`);
    lines.push(`${name} ${sample.loadAverage[index]}`);
  });

  const idleSeconds = Math.max(
    0,
    sample.uptimeSeconds * sample.cpuCount - sample.cpuUserSeconds - sample.cpuSystemSeconds,
  );
  lines.push(`# HELP ${HOST_METRIC_CPU_TIME_SECONDS_TOTAL} CPU seconds by state.`);
  lines.push(`# TYPE ${HOST_METRIC_CPU_TIME_SECONDS_TOTAL} counter`);
  lines.push(`${HOST_METRIC_CPU_TIME_SECONDS_TOTAL}{state="user"} ${sample.cpuUserSeconds}`);
  lines.push(`${HOST_METRIC_CPU_TIME_SECONDS_TOTAL}{state="system"} ${sample.cpuSystemSeconds}`);
  lines.push(`${HOST_METRIC_CPU_TIME_SECONDS_TOTAL}{state="idle"} ${idleSeconds}`);

  return `${lines.join('\n')}\n`;
}

function escapeLabelValue(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/"/g, '\\"').replace(/\n/g, '\\n');
}
