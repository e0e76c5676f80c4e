import { describe, it, expect } from 'vitest';
import { SubstitutePlaceholders, PlaceholderContext } from '../executor/placeholder';

const defaultContext: PlaceholderContext = {
  Timestamp: '2026-01-30T00:00:00.000Z',
  Database: 'TestDB',
  User: 'deployer',
  Filename: 'procedures/store.RaiseError.sql',
  Target: { Schema: 'store', Name: 'RaiseError', Kind: 'procedure' },
};

describe('SubstitutePlaceholders', () => {
  it('replaces $(sluice:schema) and $(sluice:object)', () => {
    const sql = 'CREATE PROCEDURE [$(sluice:schema)].[$(sluice:object)] AS SELECT 1;';
    const result = SubstitutePlaceholders(sql, {}, defaultContext);
    expect(result).toBe('CREATE PROCEDURE [store].[RaiseError] AS SELECT 1;');
  });

  it('replaces ${sluice:timestamp}', () => {
    const result = SubstitutePlaceholders("SELECT '${sluice:timestamp}';", {}, defaultContext);
    expect(result).toBe("SELECT '2026-01-30T00:00:00.000Z';");
  });

  it('replaces database, user and filename built-ins', () => {
    const sql = "USE [$(sluice:database)]; PRINT '$(sluice:user) ran ${sluice:filename}';";
    const result = SubstitutePlaceholders(sql, {}, defaultContext);
    expect(result).toBe("USE [TestDB]; PRINT 'deployer ran procedures/store.RaiseError.sql';");
  });

  it('replaces user-defined placeholders in both syntaxes', () => {
    const sql = 'SET @version = $(appVersion); SET @env = ${env};';
    const result = SubstitutePlaceholders(sql, { appVersion: '3.0.0', env: "'test'" }, defaultContext);
    expect(result).toBe("SET @version = 3.0.0; SET @env = 'test';");
  });

  it('lets user placeholders override built-ins', () => {
    const result = SubstitutePlaceholders('$(sluice:database)', { 'sluice:database': 'Other' }, defaultContext);
    expect(result).toBe('Other');
  });

  it('leaves unknown placeholders untouched', () => {
    const sql = "SELECT '$(unknown)', '${js.template}', '{\"a\": 1}';";
    expect(SubstitutePlaceholders(sql, {}, defaultContext)).toBe(sql);
  });

  it('leaves target placeholders untouched for untargeted scripts', () => {
    const result = SubstitutePlaceholders('$(sluice:schema)', {}, { Timestamp: 't', Target: null });
    expect(result).toBe('$(sluice:schema)');
  });

  it('replaces every occurrence', () => {
    const result = SubstitutePlaceholders('$(x) $(x) ${x}', { x: '1' }, defaultContext);
    expect(result).toBe('1 1 1');
  });
});
