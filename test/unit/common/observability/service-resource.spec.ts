import { hostname } from 'node:os';
import { describeServiceResource, toOsType } from '@/common/observability/service-resource';

describe('toOsType', () => {
  it('maps node platform names to resource os types', () => {
    expect(toOsType('win32')).toBe('windows');
    expect(toOsType('sunos')).toBe('solaris');
    expect(toOsType('linux')).toBe('linux');
    expect(toOsType('darwin')).toBe('darwin');
  });
});

describe('describeServiceResource', () => {
  it('defaults version and environment and reads the host name', () => {
    expect(describeServiceResource('email')).toEqual({
      serviceName: 'email',
      serviceVersion: '1.0.0',
      environment: 'development',
      hostName: hostname(),
      osType: toOsType(process.platform),
    });
  });

  it('keeps the configured version and environment', () => {
    const resource = describeServiceResource('email', { serviceVersion: '3.0.0', environment: 'production' });

    expect(resource.serviceVersion).toBe('3.0.0');
    expect(resource.environment).toBe('production');
  });
});
