import { describe, it, expect } from 'vitest';
import { MigrationRunner } from '../executor/runner';
import { IdempotentApplier } from '../executor/applier';
import { ObjectExistenceChecker } from '../executor/existence-checker';
import { CreateScript } from '../scripts/scanner';
import { BatchTimeoutError, ConnectionError, SluiceError, TransactionError } from '../core/errors';
import { FakeDatabase } from './helpers/fake-database';
import { ObjectScript } from './helpers/scripts';

function runner(options: { StopOnFailure?: boolean } = {}, onScriptEnd?: () => void): MigrationRunner {
  const applier = new IdempotentApplier(new ObjectExistenceChecker(), {
    Callbacks: onScriptEnd ? { OnScriptEnd: onScriptEnd } : undefined,
  });
  return new MigrationRunner(applier, options);
}

const threeScripts = () => [ObjectScript('A'), ObjectScript('B'), ObjectScript('C')];

describe('MigrationRunner', () => {
  describe('per-script mode', () => {
    it('rolls back a failing script and continues with the next', async () => {
      const db = new FakeDatabase().FailOn('CREATE PROCEDURE [dbo].[B]', new Error('Invalid column name'));
      const session = await db.OpenSession();

      const run = await runner().Run(threeScripts(), session);

      expect(run.Mode).toBe('per-script');
      expect(run.Results.map((r) => [r.Status, r.RolledBack])).toEqual([
        ['succeeded', false],
        ['failed', true],
        ['succeeded', false],
      ]);
      expect(run.Succeeded).toBe(false);
      expect(run.Cancelled).toBe(false);
      expect(run.Error).toBeUndefined();
      expect(db.HasObject('dbo', 'A')).toBe(true);
      expect(db.HasObject('dbo', 'B')).toBe(false);
      expect(db.HasObject('dbo', 'C')).toBe(true);
      expect(db.Events).toEqual([
        'open:1',
        'reset', 'begin', 'commit',
        'reset', 'begin', 'rollback',
        'reset', 'begin', 'commit',
      ]);
    });

    it('restores an object the failing script dropped', async () => {
      const db = new FakeDatabase()
        .AddObject('dbo', 'B', 'procedure')
        .FailOn('CREATE PROCEDURE [dbo].[B]', new Error('Invalid column name'));
      const session = await db.OpenSession();

      await runner().Run([ObjectScript('B')], session);

      expect(db.KindOf('dbo', 'B')).toBe('procedure');
    });

    it('stops after the first failure with StopOnFailure', async () => {
      const db = new FakeDatabase().FailOn('CREATE PROCEDURE [dbo].[B]', new Error('Invalid column name'));
      const session = await db.OpenSession();

      const run = await runner({ StopOnFailure: true }).Run(threeScripts(), session);

      expect(run.Results.map((r) => r.Status)).toEqual(['succeeded', 'failed', 'not-attempted']);
      expect(run.Cancelled).toBe(false);
      expect(db.HasObject('dbo', 'C')).toBe(false);
    });

    it('succeeds for an empty script list', async () => {
      const session = await new FakeDatabase().OpenSession();

      const run = await runner().Run([], session);

      expect(run.Results).toEqual([]);
      expect(run.Succeeded).toBe(true);
    });

    it('resets session settings between scripts', async () => {
      const db = new FakeDatabase();
      const session = await db.OpenSession();
      const first = CreateScript({ Name: 'first.sql', Text: 'SET NOCOUNT ON\nGO\nSELECT 1;' });
      const second = CreateScript({ Name: 'second.sql', Text: 'SELECT 2;' });

      await runner().Run([first, second], session);

      expect(db.Executed.map((b) => [b.SQL, b.Settings])).toEqual([
        ['SET NOCOUNT ON', {}],
        ['SELECT 1;', { NOCOUNT: 'ON' }],
        ['SELECT 2;', {}],
      ]);
    });

    it('runs every batch inside the script transaction', async () => {
      const db = new FakeDatabase();
      const session = await db.OpenSession();

      await runner().Run([ObjectScript('A')], session);

      expect(db.Executed.every((b) => b.InTransaction)).toBe(true);
    });

    it('stops before the next script when cancelled', async () => {
      const controller = new AbortController();
      const db = new FakeDatabase();
      const session = await db.OpenSession();

      const run = await runner({}, () => controller.abort()).Run(threeScripts(), session, 'per-script', controller.signal);

      expect(run.Cancelled).toBe(true);
      expect(run.Succeeded).toBe(false);
      expect(run.Results.map((r) => r.Status)).toEqual(['succeeded', 'not-attempted', 'not-attempted']);
      expect(db.HasObject('dbo', 'A')).toBe(true);
    });

    it('ends the run on a lost connection', async () => {
      const lost = new ConnectionError('Connection lost');
      const db = new FakeDatabase().FailOn('CREATE PROCEDURE [dbo].[B]', lost);
      const session = await db.OpenSession();

      const run = await runner().Run(threeScripts(), session);

      expect(run.Error).toBe(lost);
      expect(run.Results.map((r) => [r.Status, r.RolledBack])).toEqual([
        ['succeeded', false],
        ['failed', true],
        ['not-attempted', false],
      ]);
      expect(run.Results[1].Error).toBe(lost);
    });

    it('marks a script rolled back when its commit fails', async () => {
      const commitFailed = new TransactionError('Commit failed: log full');
      const db = new FakeDatabase();
      db.commitError = commitFailed;
      const session = await db.OpenSession();

      const run = await runner().Run(threeScripts(), session);

      expect(run.Error).toBe(commitFailed);
      expect(run.Results[0]).toMatchObject({ Status: 'failed', RolledBack: true, BatchesApplied: 2, TotalBatches: 2 });
      expect(run.Results.slice(1).map((r) => r.Status)).toEqual(['not-attempted', 'not-attempted']);
      expect(db.HasObject('dbo', 'A')).toBe(false);
    });

    it('fails the script when its transaction cannot begin', async () => {
      const beginFailed = new TransactionError('Cannot begin transaction');
      const db = new FakeDatabase();
      db.beginError = beginFailed;
      const session = await db.OpenSession();

      const run = await runner().Run(threeScripts(), session);

      expect(run.Error).toBe(beginFailed);
      expect(run.Results[0]).toMatchObject({ Status: 'failed', RolledBack: false, BatchesApplied: 0 });
      expect(db.Executed).toHaveLength(0);
    });

    it('reports a rollback failure as the run error', async () => {
      const rollbackFailed = new TransactionError('Rollback failed');
      const db = new FakeDatabase().FailOn('CREATE PROCEDURE [dbo].[A]', new Error('Invalid column name'));
      db.rollbackError = rollbackFailed;
      const session = await db.OpenSession();

      const run = await runner().Run(threeScripts(), session);

      expect(run.Error).toBe(rollbackFailed);
      expect(run.Results.map((r) => [r.Status, r.RolledBack])).toEqual([
        ['failed', false],
        ['not-attempted', false],
        ['not-attempted', false],
      ]);
    });

    it('rolls back a timed-out script once its batch has stopped', async () => {
      const db = new FakeDatabase().DelayOn('WAITFOR', 1000);
      db.cancelLatencyMS = 10;
      const session = await db.OpenSession();
      const applier = new IdempotentApplier(new ObjectExistenceChecker(), { BatchTimeoutMS: 20 });

      const run = await new MigrationRunner(applier).Run(
        [ObjectScript('A', 'procedure', "WAITFOR DELAY '00:00:10';"), ObjectScript('B')],
        session
      );

      expect(run.Results.map((r) => [r.Status, r.RolledBack])).toEqual([
        ['failed', true],
        ['succeeded', false],
      ]);
      expect(run.Results[0].Error).toBeInstanceOf(BatchTimeoutError);
      expect(run.Error).toBeUndefined();
      expect(db.Events).toEqual(['open:1', 'reset', 'begin', 'rollback', 'reset', 'begin', 'commit']);
    });

    it('wraps non-Sluice errors from the session', async () => {
      const db = new FakeDatabase();
      db.resetError = new Error('socket hang up');
      const session = await db.OpenSession();

      const run = await runner().Run(threeScripts(), session);

      expect(run.Error).toBeInstanceOf(SluiceError);
      expect(run.Error?.Code).toBe('UNEXPECTED_ERROR');
      expect(run.Error?.message).toBe('socket hang up');
    });
  });

  describe('all-or-nothing mode', () => {
    const fiveScripts = () => ['A', 'B', 'C', 'D', 'E'].map((name) => ObjectScript(name));

    it('rolls back every script of the run when one fails', async () => {
      const db = new FakeDatabase()
        .AddObject('dbo', 'Keep', 'view')
        .FailOn('CREATE PROCEDURE [dbo].[C]', new Error('Invalid object name'));
      const session = await db.OpenSession();

      const run = await runner().Run(fiveScripts(), session, 'all-or-nothing');

      expect(run.Mode).toBe('all-or-nothing');
      expect(run.Succeeded).toBe(false);
      expect(run.Results.map((r) => [r.Script, r.Status, r.RolledBack])).toEqual([
        ['procedures/dbo.A.sql', 'succeeded', true],
        ['procedures/dbo.B.sql', 'succeeded', true],
        ['procedures/dbo.C.sql', 'failed', true],
        ['procedures/dbo.D.sql', 'not-attempted', false],
        ['procedures/dbo.E.sql', 'not-attempted', false],
      ]);
      expect([...db.catalog.keys()]).toEqual(['dbo.keep']);
      expect(db.Events).toEqual(['open:1', 'begin', 'reset', 'reset', 'reset', 'rollback']);
    });

    it('commits once after every script succeeds', async () => {
      const db = new FakeDatabase();
      const session = await db.OpenSession();

      const run = await runner().Run(fiveScripts(), session, 'all-or-nothing');

      expect(run.Succeeded).toBe(true);
      expect(run.Results.every((r) => r.Succeeded && !r.RolledBack)).toBe(true);
      expect(db.Events.filter((e) => e === 'begin' || e === 'commit')).toEqual(['begin', 'commit']);
      expect(db.catalog.size).toBe(5);
    });

    it('rolls everything back when cancelled', async () => {
      const controller = new AbortController();
      const db = new FakeDatabase();
      const session = await db.OpenSession();

      const run = await runner({}, () => controller.abort()).Run(fiveScripts(), session, 'all-or-nothing', controller.signal);

      expect(run.Cancelled).toBe(true);
      expect(run.Results.map((r) => [r.Status, r.RolledBack])).toEqual([
        ['succeeded', true],
        ['not-attempted', false],
        ['not-attempted', false],
        ['not-attempted', false],
        ['not-attempted', false],
      ]);
      expect(db.catalog.size).toBe(0);
    });

    it('marks every script rolled back when the final commit fails', async () => {
      const commitFailed = new TransactionError('Commit failed');
      const db = new FakeDatabase();
      db.commitError = commitFailed;
      const session = await db.OpenSession();

      const run = await runner().Run(fiveScripts(), session, 'all-or-nothing');

      expect(run.Error).toBe(commitFailed);
      expect(run.Results.every((r) => r.RolledBack)).toBe(true);
      expect(db.catalog.size).toBe(0);
    });

    it('rolls back on a lost connection and reports it', async () => {
      const lost = new ConnectionError('Connection lost');
      const db = new FakeDatabase().FailOn('CREATE PROCEDURE [dbo].[B]', lost);
      const session = await db.OpenSession();

      const run = await runner().Run(fiveScripts(), session, 'all-or-nothing');

      expect(run.Error).toBe(lost);
      expect(run.Results.map((r) => r.Status)).toEqual([
        'succeeded',
        'failed',
        'not-attempted',
        'not-attempted',
        'not-attempted',
      ]);
      expect(run.Results[0].RolledBack).toBe(true);
      expect(db.catalog.size).toBe(0);
    });
  });

  it('rejects a second concurrent run', async () => {
    const db = new FakeDatabase().DelayOn('SELECT', 20);
    const session = await db.OpenSession();
    const shared = runner();

    const first = shared.Run(threeScripts(), session);
    await expect(shared.Run(threeScripts(), session)).rejects.toMatchObject({ Code: 'RUN_IN_PROGRESS' });
    await first;

    const again = await shared.Run([], session);
    expect(again.Succeeded).toBe(true);
  });
});
