import { describe, it, expect } from 'vitest';
import * as path from 'node:path';
import {
  buildTransportOptions,
  buildEnvironmentOverrides,
  validateTransportConfig,
} from '../transport/option-builder.js';
import { USER_AGENT } from '../constants.js';

const BASE_ARGS = [
  '--fail',
  '--location',
  '--max-redirs', '10',
  '--user-agent', USER_AGENT,
];

describe('buildTransportOptions', () => {
  it('should emit only the fixed flags for an empty config', () => {
    const { args, env } = buildTransportOptions({});

    expect(args).toEqual(BASE_ARGS);
    expect(env).toEqual({});
  });

  it('should identify the product in the user agent', () => {
    expect(USER_AGENT).toBe('supervised-fetch/0.1.0');
  });

  it('should not include -u without auth', () => {
    const { args } = buildTransportOptions({
      caCertPath: '/etc/ca.pem',
      resume: true,
      headers: ['Accept: */*'],
    });

    expect(args).not.toContain('-u');
  });

  it('should append every policy in a fixed order', () => {
    const { args } = buildTransportOptions({
      headers: ['X-Trace: 1'],
      auth: 'alice:secret',
      clientCertPath: '/certs/client.pem',
      insecureTLS: true,
      resume: true,
      caDirPath: '/etc/ssl/certs',
      caCertPath: '/etc/ca.pem',
    });

    expect(args).toEqual([
      ...BASE_ARGS,
      '--cacert', '/etc/ca.pem',
      '--capath', '/etc/ssl/certs',
      '--continue-at', '-',
      '--insecure',
      '--cert', '/certs/client.pem',
      '-u', 'alice:secret',
      '-H', 'X-Trace: 1',
    ]);
  });

  it('should preserve header order as separate -H pairs', () => {
    const { args } = buildTransportOptions({ headers: ['X-A: 1', 'X-B: 2'] });

    expect(args.slice(BASE_ARGS.length)).toEqual(['-H', 'X-A: 1', '-H', 'X-B: 2']);
  });

  it('should pass duplicate headers through', () => {
    const { args } = buildTransportOptions({ headers: ['X-A: 1', 'X-A: 2'] });

    expect(args.slice(BASE_ARGS.length)).toEqual(['-H', 'X-A: 1', '-H', 'X-A: 2']);
  });

  it('should omit false boolean policies', () => {
    const { args } = buildTransportOptions({ resume: false, insecureTLS: false });

    expect(args).toEqual(BASE_ARGS);
  });

  it('should return a fresh argument list on every call', () => {
    const first = buildTransportOptions({});
    first.args.push('--output', '/tmp/x');

    expect(buildTransportOptions({}).args).toEqual(BASE_ARGS);
  });
});

describe('buildEnvironmentOverrides', () => {
  it('should leave the environment alone outside packaged mode', () => {
    expect(buildEnvironmentOverrides({ installerEmbeddedDir: '/opt/app/embedded' })).toEqual({});
  });

  it('should point curl at the embedded CA bundle in packaged mode', () => {
    const env = buildEnvironmentOverrides({
      packaged: true,
      installerEmbeddedDir: '/opt/app/embedded',
    });

    expect(env).toEqual({ CURL_CA_BUNDLE: path.resolve('/opt/app/embedded', 'cacert.pem') });
  });

  it('should be carried through buildTransportOptions', () => {
    const { env } = buildTransportOptions({
      packaged: true,
      installerEmbeddedDir: '/opt/app/embedded',
    });

    expect(env['CURL_CA_BUNDLE']).toBe(path.resolve('/opt/app/embedded', 'cacert.pem'));
  });
});

describe('validateTransportConfig', () => {
  it('should accept an empty config', () => {
    expect(validateTransportConfig({})).toEqual([]);
  });

  it('should accept well-formed headers, including curl\'s empty-header form', () => {
    expect(validateTransportConfig({ headers: ['Accept: text/plain', 'X-Empty;'] })).toEqual([]);
  });

  it('should reject blank headers', () => {
    expect(validateTransportConfig({ headers: ['  '] })).toEqual(['headers[0] is empty']);
  });

  it('should reject headers without a separator', () => {
    const errors = validateTransportConfig({ headers: ['Accept: */*', 'Broken'] });

    expect(errors).toEqual(['headers[1] must look like "Name: value" or "Name;"']);
  });

  it('should reject an empty auth string', () => {
    expect(validateTransportConfig({ auth: '' })).toEqual(['auth must not be an empty string']);
  });

  it('should require the embedded dir in packaged mode', () => {
    expect(validateTransportConfig({ packaged: true })).toEqual([
      'installerEmbeddedDir is required when packaged is true',
    ]);
  });
});
