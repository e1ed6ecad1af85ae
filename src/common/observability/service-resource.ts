import { hostname, platform } from 'node:os';

/** Identity of one running service, shared by spans and the metrics endpoint. */
export interface ServiceResource {
  readonly serviceName: string;
  readonly serviceVersion: string;
  readonly environment: string;
  readonly hostName: string;
  readonly osType: string;
}

// OpenTelemetry `os.type` values where Node's platform name differs.
const OS_TYPES: Partial<Record<NodeJS.Platform, string>> = {
  win32: 'windows',
  sunos: 'solaris',
};

export function toOsType(nodePlatform: NodeJS.Platform): string {
  return OS_TYPES[nodePlatform] ?? nodePlatform;
}

export function describeServiceResource(
  serviceName: string,
  options: { serviceVersion?: string; environment?: string } = {},
): ServiceResource {
  return {
    serviceName,
    serviceVersion: options.serviceVersion ?? '1.0.0',
    environment: options.environment ?? 'development',
    hostName: hostname(),
    osType: toOsType(platform()),
  };
}
