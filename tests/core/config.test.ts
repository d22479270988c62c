/**
 * Tests for configuration resolution
 * Passes explicit environments so the host environment never leaks in
 */

jest.mock('node:os', () => ({
  homedir: jest.fn(() => '/mock/home'),
}));

import { resolveConfig } from '../../src/core/config.js';

describe('resolveConfig', () => {
  it('should use defaults with an empty environment', () => {
    expect(resolveConfig({}, {})).toEqual({
      contactPoints: ['localhost:9042'],
      localDataCenter: 'datacenter1',
      username: undefined,
      password: undefined,
      stateFilePath: '/mock/home/.cql-labs/state.json',
      verbose: false,
    });
  });

  it('should read CQL_LABS_* variables', () => {
    const config = resolveConfig(
      {},
      {
        CQL_LABS_CONTACT_POINTS: 'node1:9042, node2:9042,',
        CQL_LABS_DATACENTER: 'dc-east',
        CQL_LABS_USERNAME: 'learner',
        CQL_LABS_PASSWORD: 'test-secret',
        CQL_LABS_STATE_FILE: '/tmp/progress.json',
        CQL_LABS_VERBOSE: '1',
      },
    );

    expect(config).toEqual({
      contactPoints: ['node1:9042', 'node2:9042'],
      localDataCenter: 'dc-east',
      username: 'learner',
      password: 'test-secret',
      stateFilePath: '/tmp/progress.json',
      verbose: true,
    });
  });

  it('should let overrides win over the environment', () => {
    const config = resolveConfig(
      { contactPoints: ['10.0.0.5:9042'], localDataCenter: 'dc-west', verbose: false },
      { CQL_LABS_CONTACT_POINTS: 'node1:9042', CQL_LABS_DATACENTER: 'dc-east', CQL_LABS_VERBOSE: '1' },
    );

    expect(config.contactPoints).toEqual(['10.0.0.5:9042']);
    expect(config.localDataCenter).toBe('dc-west');
    expect(config.verbose).toBe(false);
  });

  it('should treat blank values as unset', () => {
    const config = resolveConfig(
      { contactPoints: [], localDataCenter: '  ' },
      { CQL_LABS_CONTACT_POINTS: ' , ', CQL_LABS_DATACENTER: '' },
    );

    expect(config.contactPoints).toEqual(['localhost:9042']);
    expect(config.localDataCenter).toBe('datacenter1');
  });
});
