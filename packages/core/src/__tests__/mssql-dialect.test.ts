import { describe, it, expect } from 'vitest';
import * as sql from 'mssql';
import {
  FormatDropStatement,
  MapCatalogType,
  QuoteIdentifier,
  QuoteObjectRef,
  SESSION_RESET_SQL,
} from '../db/mssql-dialect';
import { TranslateDriverError } from '../db/mssql-session';
import { ConnectionError } from '../core/errors';

describe('MapCatalogType', () => {
  it.each([
    ['P', 'procedure'],
    ['PC', 'procedure'],
    ['V ', 'view'],
    ['IF', 'function'],
    ['TF', 'function'],
    ['TR', 'trigger'],
    ['U', 'table'],
    ['SN', 'other'],
  ])('maps %j to %s', (code, kind) => {
    expect(MapCatalogType(code)).toBe(kind);
  });

  it('ignores case', () => {
    expect(MapCatalogType('fn')).toBe('function');
  });
});

describe('quoting', () => {
  it('brackets identifiers and doubles closing brackets', () => {
    expect(QuoteIdentifier('vwOrders')).toBe('[vwOrders]');
    expect(QuoteIdentifier('odd]name')).toBe('[odd]]name]');
  });

  it('formats two-part names', () => {
    expect(QuoteObjectRef({ Schema: 'store', Name: 'My View', Kind: 'view' })).toBe('[store].[My View]');
  });
});

describe('FormatDropStatement', () => {
  it.each([
    [{ Schema: 'store', Name: 'RaiseError', Kind: 'procedure' as const }, 'DROP PROCEDURE [store].[RaiseError]'],
    [{ Schema: 'dbo', Name: 'vwOrders', Kind: 'view' as const }, 'DROP VIEW [dbo].[vwOrders]'],
    [{ Schema: 'dbo', Name: 'fnTotal', Kind: 'function' as const }, 'DROP FUNCTION [dbo].[fnTotal]'],
    [{ Schema: 'dbo', Name: 'trAudit', Kind: 'trigger' as const }, 'DROP TRIGGER [dbo].[trAudit]'],
  ])('drops %o', (ref, expected) => {
    expect(FormatDropStatement(ref)).toBe(expected);
  });
});

describe('SESSION_RESET_SQL', () => {
  it('restores the settings scripts commonly change', () => {
    const lines = SESSION_RESET_SQL.split('\n');
    expect(lines).toContain('SET ANSI_NULLS ON;');
    expect(lines).toContain('SET QUOTED_IDENTIFIER ON;');
    expect(lines).toContain('SET NOCOUNT OFF;');
    expect(lines).toContain('SET XACT_ABORT OFF;');
  });
});

describe('TranslateDriverError', () => {
  it('turns driver connection errors into ConnectionError', () => {
    const driverError = new sql.ConnectionError('Failed to connect to localhost:1433', 'ESOCKET');

    const translated = TranslateDriverError(driverError);

    expect(translated).toBeInstanceOf(ConnectionError);
    expect(translated.message).toBe('Connection to SQL Server failed: Failed to connect to localhost:1433');
    expect(translated.cause).toBe(driverError);
  });

  it('treats a closed connection during a request as lost', () => {
    const driverError = new sql.RequestError('Connection is closed.', 'ECONNCLOSED');

    const translated = TranslateDriverError(driverError);

    expect(translated).toBeInstanceOf(ConnectionError);
    expect(translated.message).toBe('Connection to SQL Server lost: Connection is closed.');
  });

  it('passes server errors through unchanged', () => {
    const driverError = new sql.RequestError("Invalid object name 'dbo.Missing'.", 'EREQUEST');

    expect(TranslateDriverError(driverError)).toBe(driverError);
  });

  it('keeps an existing ConnectionError', () => {
    const lost = new ConnectionError('Connection lost');
    expect(TranslateDriverError(lost)).toBe(lost);
  });

  it('wraps non-error values', () => {
    const translated = TranslateDriverError('boom');
    expect(translated).toBeInstanceOf(Error);
    expect(translated.message).toBe('boom');
  });
});
