import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { Sluice } from '../core/sluice';
import { SluiceConfig } from '../core/config';
import { ObjectKind } from '../scripts/types';
import { FakeDatabase, InMemoryLedger } from './helpers/fake-database';

let root: string;

const TYPE_CODES: Record<ObjectKind, string> = { procedure: 'P', view: 'V', function: 'FN', trigger: 'TR' };

function writeObjectScript(kind: ObjectKind, name: string, body: string = 'SELECT 1 AS x;'): void {
  const keyword = kind.toUpperCase();
  const fullPath = path.join(root, `${kind}s`, `dbo.${name}.sql`);
  fs.mkdirSync(path.dirname(fullPath), { recursive: true });
  fs.writeFileSync(
    fullPath,
    [
      `IF OBJECT_ID('dbo.${name}', '${TYPE_CODES[kind]}') IS NOT NULL`,
      `    DROP ${keyword} [dbo].[${name}]`,
      'GO',
      `CREATE ${keyword} [dbo].[${name}]`,
      'AS',
      body,
    ].join('\n')
  );
}

function config(overrides: Partial<SluiceConfig> = {}): SluiceConfig {
  return {
    Database: { Server: 'localhost', Database: 'Shop', User: 'sa', Password: 'test-secret' },
    Scripts: { Locations: [root] },
    ...overrides,
  };
}

beforeEach(() => {
  root = fs.mkdtempSync(path.join(os.tmpdir(), 'sluice-deploy-'));
  writeObjectScript('procedure', 'uspGetOrders');
  writeObjectScript('view', 'vwOrders');
  writeObjectScript('function', 'fnTotal');
});

afterEach(() => {
  fs.rmSync(root, { recursive: true, force: true });
});

const PLAN = ['functions/dbo.fnTotal.sql', 'views/dbo.vwOrders.sql', 'procedures/dbo.uspGetOrders.sql'];

describe('Sluice.Deploy', () => {
  it('applies every script in kind order', async () => {
    const db = new FakeDatabase();

    const result = await new Sluice(config(), { Access: db }).Deploy();

    expect(result).toMatchObject({
      ScriptsFound: 3,
      ScriptsApplied: 3,
      ScriptsFailed: 0,
      ScriptsNotAttempted: 0,
      Plan: PLAN,
      DryRun: false,
      Success: true,
    });
    expect(result.ErrorMessage).toBeUndefined();
    expect(db.KindOf('dbo', 'fnTotal')).toBe('function');
    expect(db.KindOf('dbo', 'vwOrders')).toBe('view');
    expect(db.KindOf('dbo', 'uspGetOrders')).toBe('procedure');
    expect(db.Sessions).toHaveLength(1);
    expect(db.Sessions[0].Closed).toBe(true);
  });

  it('can be deployed again over its own objects', async () => {
    const db = new FakeDatabase();
    const sluice = new Sluice(config(), { Access: db });

    await sluice.Deploy();
    const second = await sluice.Deploy();

    expect(second.Success).toBe(true);
    expect(second.Run?.Results.every((r) => r.PreviouslyExisted === true)).toBe(true);
  });

  it('reports the plan without touching the database on a dry run', async () => {
    const db = new FakeDatabase();

    const result = await new Sluice(config({ DryRun: true }), { Access: db }).Deploy();

    expect(result).toMatchObject({
      ScriptsFound: 3,
      ScriptsApplied: 0,
      ScriptsNotAttempted: 3,
      Plan: PLAN,
      DryRun: true,
      Run: null,
      Success: true,
    });
    expect(db.Sessions).toHaveLength(0);
  });

  it('succeeds without a session when there are no scripts', async () => {
    const db = new FakeDatabase();
    const empty = fs.mkdtempSync(path.join(os.tmpdir(), 'sluice-empty-'));

    try {
      const result = await new Sluice(config({ Scripts: { Locations: [empty] } }), { Access: db }).Deploy();
      expect(result.Success).toBe(true);
      expect(result.ScriptsFound).toBe(0);
      expect(db.Sessions).toHaveLength(0);
    } finally {
      fs.rmSync(empty, { recursive: true, force: true });
    }
  });

  it('reports a failing script and keeps the others in per-script mode', async () => {
    const db = new FakeDatabase().FailOn('CREATE VIEW [dbo].[vwOrders]', new Error("Invalid object name 'dbo.Orders'."));

    const result = await new Sluice(config(), { Access: db }).Deploy();

    expect(result).toMatchObject({ ScriptsApplied: 2, ScriptsFailed: 1, ScriptsNotAttempted: 0, Success: false });
    expect(result.ErrorMessage).toBe(
      "Failed at batch 2/2 (line 4) of views/dbo.vwOrders.sql: Invalid object name 'dbo.Orders'."
    );
    expect(db.HasObject('dbo', 'vwOrders')).toBe(false);
    expect(db.HasObject('dbo', 'uspGetOrders')).toBe(true);
  });

  it('leaves nothing applied in all-or-nothing mode', async () => {
    const db = new FakeDatabase().FailOn('CREATE PROCEDURE [dbo].[uspGetOrders]', new Error('Invalid column name'));

    const result = await new Sluice(config({ TransactionMode: 'all-or-nothing' }), { Access: db }).Deploy();

    expect(result).toMatchObject({ ScriptsApplied: 0, ScriptsFailed: 1, Success: false });
    expect(result.Run?.Results.map((r) => r.RolledBack)).toEqual([true, true, true]);
    expect(db.catalog.size).toBe(0);
  });

  it('returns a failed result when scripts cannot be ordered', async () => {
    fs.writeFileSync(path.join(root, 'views', 'dbo.vwA.sql'), '-- sluice:depends-on dbo.vwB\nSELECT 1;');
    fs.writeFileSync(path.join(root, 'views', 'dbo.vwB.sql'), '-- sluice:depends-on dbo.vwA\nSELECT 1;');
    const db = new FakeDatabase();

    const result = await new Sluice(config(), { Access: db }).Deploy();

    expect(result.Success).toBe(false);
    expect(result.ErrorMessage).toBe('Cannot order scripts: dependency cycle among views/dbo.vwA.sql, views/dbo.vwB.sql');
    expect(db.Sessions).toHaveLength(0);
  });

  it('substitutes placeholders from the config', async () => {
    writeObjectScript('view', 'vwInfo', "SELECT '$(sluice:database)' AS db, '$(region)' AS region;");
    const db = new FakeDatabase();

    await new Sluice(config({ Placeholders: { region: 'eu' } }), { Access: db }).Deploy();

    expect(db.ExecutedSQL).toContain("CREATE VIEW [dbo].[vwInfo]\nAS\nSELECT 'Shop' AS db, 'eu' AS region;");
  });

  it('reports progress through callbacks', async () => {
    const started: string[] = [];
    const ended: string[] = [];
    const sluice = new Sluice(config(), { Access: new FakeDatabase() }).OnProgress({
      OnScriptStart: (script) => started.push(script.Name),
      OnScriptEnd: (result) => ended.push(`${result.Script}:${result.Status}`),
    });

    await sluice.Deploy();

    expect(started).toEqual(PLAN);
    expect(ended).toEqual(PLAN.map((name) => `${name}:succeeded`));
  });

  it('passes batch output to OnOutput when DisplayOutput is set', async () => {
    const db = new FakeDatabase().ReturnOn('CREATE VIEW [dbo].[vwOrders]', [[{ x: 1 }]]);
    const outputs: string[] = [];
    const sluice = new Sluice(config({ DisplayOutput: true }), { Access: db }).OnProgress({
      OnOutput: (script, batch, output) => outputs.push(`${script.Name}#${batch.Index}:${output.Recordsets.length}`),
    });

    await sluice.Deploy();

    expect(outputs).toEqual([
      'functions/dbo.fnTotal.sql#1:0',
      'functions/dbo.fnTotal.sql#2:0',
      'views/dbo.vwOrders.sql#1:0',
      'views/dbo.vwOrders.sql#2:1',
      'procedures/dbo.uspGetOrders.sql#1:0',
      'procedures/dbo.uspGetOrders.sql#2:0',
    ]);
  });

  describe('history', () => {
    it('records every script of the run under one run id', async () => {
      const ledger = new InMemoryLedger();

      await new Sluice(config({ History: { Enabled: true } }), { Access: new FakeDatabase(), Ledger: ledger }).Deploy();

      expect(ledger.Created).toBe(true);
      expect(ledger.Records.map((r) => [r.Script, r.Status, r.ObjectName, r.InstalledBy])).toEqual([
        ['functions/dbo.fnTotal.sql', 'succeeded', 'dbo.fnTotal', 'sa'],
        ['views/dbo.vwOrders.sql', 'succeeded', 'dbo.vwOrders', 'sa'],
        ['procedures/dbo.uspGetOrders.sql', 'succeeded', 'dbo.uspGetOrders', 'sa'],
      ]);
      expect(new Set(ledger.Records.map((r) => r.RunId)).size).toBe(1);
    });

    it('leaves scripts that were never attempted out of the history', async () => {
      const ledger = new InMemoryLedger();
      const db = new FakeDatabase().FailOn('CREATE FUNCTION [dbo].[fnTotal]', new Error('Incorrect syntax'));

      await new Sluice(config({ StopOnFailure: true, History: { Enabled: true } }), { Access: db, Ledger: ledger }).Deploy();

      expect(ledger.Records).toHaveLength(1);
      expect(ledger.Records[0]).toMatchObject({
        Script: 'functions/dbo.fnTotal.sql',
        Status: 'failed',
        RolledBack: true,
        BatchesApplied: 1,
        ErrorMessage: 'Failed at batch 2/2 (line 4) of functions/dbo.fnTotal.sql: Incorrect syntax',
      });
    });

    it('does not record anything when history is disabled', async () => {
      const ledger = new InMemoryLedger();

      await new Sluice(config(), { Access: new FakeDatabase(), Ledger: ledger }).Deploy();

      expect(ledger.Records).toHaveLength(0);
      expect(ledger.Created).toBe(false);
    });

    it('logs a history failure without failing the deployment', async () => {
      const ledger = new InMemoryLedger();
      ledger.recordError = new Error('disk full');
      const logs: string[] = [];

      const result = await new Sluice(config({ History: { Enabled: true } }), { Access: new FakeDatabase(), Ledger: ledger })
        .OnProgress({ OnLog: (message) => logs.push(message) })
        .Deploy();

      expect(result.Success).toBe(true);
      expect(logs).toContain('Warning: failed to record history: disk full');
    });

    it('returns recorded rows from History()', async () => {
      const ledger = new InMemoryLedger();
      const sluice = new Sluice(config({ History: { Enabled: true } }), { Access: new FakeDatabase(), Ledger: ledger });

      await sluice.Deploy();

      expect((await sluice.History()).map((r) => r.DeployRank)).toEqual([1, 2, 3]);
    });

    it('returns no rows without a history table', async () => {
      expect(await new Sluice(config(), { Access: new FakeDatabase() }).History()).toEqual([]);
    });
  });
});

describe('Sluice.Status', () => {
  it('reports presence, kind mismatches and checksum changes', async () => {
    const db = new FakeDatabase();
    const ledger = new InMemoryLedger();
    await new Sluice(config({ History: { Enabled: true } }), { Access: db, Ledger: ledger }).Deploy();

    db.catalog.delete('dbo.uspgetorders');
    db.catalog.set('dbo.vworders', 'table');
    writeObjectScript('function', 'fnTotal', 'SELECT 2 AS x;');

    const statuses = await new Sluice(config(), { Access: db, Ledger: ledger }).Status();

    expect(statuses.map((s) => [s.Script, s.Object, s.State, s.CatalogKind, s.ChecksumChanged])).toEqual([
      ['functions/dbo.fnTotal.sql', 'dbo.fnTotal', 'present', 'function', true],
      ['views/dbo.vwOrders.sql', 'dbo.vwOrders', 'kind-mismatch', 'table', false],
      ['procedures/dbo.uspGetOrders.sql', 'dbo.uspGetOrders', 'missing', null, false],
    ]);
    expect(statuses[0].LastDeployment?.DeployRank).toBe(1);
  });

  it('has no last deployment for scripts never deployed', async () => {
    const statuses = await new Sluice(config(), { Access: new FakeDatabase() }).Status();

    expect(statuses.every((s) => s.LastDeployment === null && s.ChecksumChanged === null)).toBe(true);
    expect(statuses.map((s) => s.State)).toEqual(['missing', 'missing', 'missing']);
  });

  it('ignores failed and rolled back deployments', async () => {
    const db = new FakeDatabase().FailOn('CREATE VIEW [dbo].[vwOrders]', new Error('Invalid column name'));
    const ledger = new InMemoryLedger();
    await new Sluice(config({ History: { Enabled: true } }), { Access: db, Ledger: ledger }).Deploy();

    const statuses = await new Sluice(config(), { Access: new FakeDatabase(), Ledger: ledger }).Status();

    expect(statuses[1].LastDeployment).toBeNull();
    expect(statuses[0].LastDeployment?.Script).toBe('functions/dbo.fnTotal.sql');
  });
});

describe('Sluice.Drop', () => {
  it('drops existing objects in reverse deployment order', async () => {
    const db = new FakeDatabase().AddObject('dbo', 'fnTotal', 'function').AddObject('dbo', 'vwOrders', 'view');

    const result = await new Sluice(config(), { Access: db }).Drop();

    expect(result).toEqual({
      Dropped: ['dbo.vwOrders', 'dbo.fnTotal'],
      Skipped: ['dbo.uspGetOrders'],
      Cancelled: false,
      Success: true,
    });
    expect(db.ExecutedSQL).toEqual(['DROP VIEW [dbo].[vwOrders]', 'DROP FUNCTION [dbo].[fnTotal]']);
    expect(db.catalog.size).toBe(0);
  });

  it('leaves an object of another kind alone', async () => {
    const db = new FakeDatabase().AddObject('dbo', 'vwOrders', 'table');

    const result = await new Sluice(config(), { Access: db }).Drop();

    expect(result.Dropped).toEqual([]);
    expect(result.Skipped).toContain('dbo.vwOrders');
    expect(db.KindOf('dbo', 'vwOrders')).toBe('table');
  });

  it('stops when cancelled', async () => {
    const db = new FakeDatabase().AddObject('dbo', 'fnTotal', 'function');
    const controller = new AbortController();
    controller.abort();

    const result = await new Sluice(config(), { Access: db }).Drop(controller.signal);

    expect(result).toEqual({ Dropped: [], Skipped: [], Cancelled: true, Success: false });
    expect(db.HasObject('dbo', 'fnTotal')).toBe(true);
  });

  it('reports a failed drop', async () => {
    const db = new FakeDatabase()
      .AddObject('dbo', 'fnTotal', 'function')
      .AddObject('dbo', 'uspGetOrders', 'procedure')
      .FailOn('DROP FUNCTION', new Error('Cannot drop the function because it is referenced by a constraint'));

    const result = await new Sluice(config(), { Access: db }).Drop();

    expect(result.Success).toBe(false);
    expect(result.Dropped).toEqual(['dbo.uspGetOrders']);
    expect(result.Skipped).toEqual(['dbo.vwOrders']);
    expect(result.ErrorMessage).toBe('Cannot drop the function because it is referenced by a constraint');
  });
});
