import { describe, it, expect } from 'vitest';
import { pathToFileURL } from 'url';
import { isEntryPoint, parseMigrationFilenames } from '../migrate.js';

describe('parseMigrationFilenames', () => {
  it('keeps .sql files ordered by numeric version', () => {
    expect(parseMigrationFilenames(['010_later.sql', 'README.md', '002_roles.sql', '001_init.sql'])).toEqual([
      { filename: '001_init.sql', version: 1 },
      { filename: '002_roles.sql', version: 2 },
      { filename: '010_later.sql', version: 10 },
    ]);
  });

  it('rejects a file without a version prefix', () => {
    expect(() => parseMigrationFilenames(['init.sql'])).toThrow('Invalid migration filename: init.sql');
  });
});

describe('isEntryPoint', () => {
  it('matches a script path that needs percent-encoding in its URL', () => {
    const script = '/srv/my app/100%/migrate.ts';
    expect(isEntryPoint(pathToFileURL(script).href, script)).toBe(true);
  });

  it('does not match another script or a missing argv entry', () => {
    const moduleUrl = pathToFileURL('/srv/app/src/infra/db/migrate.ts').href;
    expect(isEntryPoint(moduleUrl, '/srv/app/node_modules/vitest/vitest.mjs')).toBe(false);
    expect(isEntryPoint(moduleUrl, undefined)).toBe(false);
  });
});
