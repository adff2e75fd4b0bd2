import { SqlConfigProfile } from '../../types/index.js';
import { ConfigurationError } from '../errors.js';

export type SetActiveResult =
  | { ok: true; previous: string; current: string; profile: SqlConfigProfile }
  | { ok: false; kind: 'UnknownProfile'; message: string; available: string[] };

/**
 * SqlConfigStore - named SQL Server profiles plus the active selection
 *
 * Profiles are frozen at construction. The active name is one field that is
 * read and replaced synchronously, so on the event loop a reader always sees
 * either the previous or the new name. Callers read the active profile once
 * per call and hold no reference to the store while a query runs.
 */
export class SqlConfigStore {
  private readonly profiles: ReadonlyMap<string, SqlConfigProfile>;
  private activeName: string;

  constructor(profiles: readonly SqlConfigProfile[], defaultProfile: string) {
    if (profiles.length === 0) {
      throw new ConfigurationError('At least one SQL profile must be defined');
    }

    const byName = new Map<string, SqlConfigProfile>();
    for (const profile of profiles) {
      if (byName.has(profile.name)) {
        throw new ConfigurationError(`SQL profile '${profile.name}' is defined more than once`);
      }
      byName.set(profile.name, Object.freeze({ ...profile, credential: Object.freeze({ ...profile.credential }) }));
    }

    if (!byName.has(defaultProfile)) {
      throw new ConfigurationError(
        `Default SQL profile '${defaultProfile}' not found. Available: ${[...byName.keys()].join(', ')}`
      );
    }

    this.profiles = byName;
    this.activeName = defaultProfile;
  }

  /** Profile names in definition order. */
  list(): string[] {
    return [...this.profiles.keys()];
  }

  listProfiles(): SqlConfigProfile[] {
    return [...this.profiles.values()];
  }

  get(name: string): SqlConfigProfile | undefined {
    return this.profiles.get(name);
  }

  getActiveName(): string {
    return this.activeName;
  }

  getActive(): SqlConfigProfile {
    const profile = this.profiles.get(this.activeName);
    if (!profile) {
      // activeName is only ever assigned a key of profiles
      throw new ConfigurationError(`Active SQL profile '${this.activeName}' is not defined`);
    }
    return profile;
  }

  setActive(name: string): SetActiveResult {
    const profile = this.profiles.get(name);
    if (!profile) {
      const available = this.list();
      return {
        ok: false,
        kind: 'UnknownProfile',
        message: `Configuration '${name}' not found. Available: ${available.join(', ')}`,
        available,
      };
    }

    const previous = this.activeName;
    this.activeName = name;
    return { ok: true, previous, current: name, profile };
  }
}
