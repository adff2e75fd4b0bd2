import { describe, expect, it } from 'vitest';
import { ConfigurationError } from '../../services/errors.js';
import { loadSqlProfiles, parseSqlProfiles } from '../sqlProfiles.js';

describe('loadSqlProfiles', () => {
  it('loads the bundled profiles', () => {
    const { defaultProfile, profiles } = loadSqlProfiles();

    expect(defaultProfile).toBe('azure_relaxed');
    expect(profiles.map(profile => profile.name)).toEqual([
      'azure_production',
      'azure_relaxed',
      'local_test',
      'docker_test',
      'azure_functions',
    ]);
  });

  it('defaults the port and keeps only credential references', () => {
    const localTest = loadSqlProfiles().profiles.find(profile => profile.name === 'local_test');
    expect(localTest).toMatchObject({
      port: 1433,
      authMode: 'password',
      credential: { username: 'sa', passwordVariable: 'SQL_PASSWORD' },
    });
  });

  it('reports unreadable files', () => {
    expect(() => loadSqlProfiles('/nonexistent/sql-profiles.json')).toThrow(ConfigurationError);
  });
});

describe('parseSqlProfiles', () => {
  const profile = {
    name: 'local',
    title: 'Local',
    description: 'Local server',
    server: 'localhost',
    database: 'TestDB',
    authMode: 'password',
    encrypt: false,
    trustServerCertificate: true,
    timeoutSeconds: 15,
    credential: { username: 'sa', passwordVariable: 'TEST_SQL_PASSWORD' },
  };

  it('accepts a valid definition', () => {
    const parsed = parseSqlProfiles({ defaultProfile: 'local', profiles: [profile] });
    expect(parsed.profiles[0].port).toBe(1433);
  });

  it('rejects literal secrets in the credential reference', () => {
    const withSecret = { ...profile, credential: { username: 'sa', password: 'test-secret' } };
    expect(() => parseSqlProfiles({ defaultProfile: 'local', profiles: [withSecret] })).toThrow(
      /Invalid SQL profile definitions: profiles\.0\.credential/
    );
  });

  it('rejects unknown authentication modes', () => {
    expect(() =>
      parseSqlProfiles({ defaultProfile: 'local', profiles: [{ ...profile, authMode: 'kerberos' }] })
    ).toThrow(ConfigurationError);
  });
});
