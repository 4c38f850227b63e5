/**
 * End-to-end tests for the review/build session. Workbooks and archives are
 * read back with exceljs and jszip.
 */

import { describe, it, expect, vi } from 'vitest';
import ExcelJS from 'exceljs';
import type { Worksheet } from 'exceljs';
import JSZip from 'jszip';
import type { SubmissionMetadata, UploadedFile } from '@cfdi-bundle/contracts';
import {
  ConfigurationError,
  MissingUploadSetError,
  ValidationError,
  createSafeLogger,
  createSequentialIdGenerator,
} from '@cfdi-bundle/shared';
import type { Clock } from '../context/clock.js';
import type { BuildCompleteEvent, SessionEventHooks } from '../events/hooks.js';
import { SubmissionSession } from './submission-session.js';

const ID_1 = 'A1B2C3D4-0001-4000-8000-000000000001';
const ID_2 = 'A1B2C3D4-0002-4000-8000-000000000002';

const METADATA: SubmissionMetadata = {
  requestedPeriod: 'March 2024',
  claimantName: 'Test Claimant',
  contactEmail: 'claimant@example.com',
  personalIdLast4: '0042',
};

const FIXED_CLOCK: Clock = { now: () => new Date('2024-03-05T10:00:00.000Z') };

interface InvoiceFields {
  date: string;
  uuid?: string;
  total?: string;
  tax?: string;
}

function invoice(fileName: string, fields: InvoiceFields): UploadedFile {
  const stamp = fields.uuid
    ? `<cfdi:Complemento><tfd:TimbreFiscalDigital xmlns:tfd="http://www.sat.gob.mx/TimbreFiscalDigital" UUID="${fields.uuid}"/></cfdi:Complemento>`
    : '';
  const xml = `<?xml version="1.0" encoding="UTF-8"?>
<cfdi:Comprobante xmlns:cfdi="http://www.sat.gob.mx/cfd/4" Version="4.0" Fecha="${fields.date}T09:00:00" Moneda="MXN" Total="${fields.total ?? '116.00'}">
  <cfdi:Emisor Rfc="AAA010101AAA"/>
  <cfdi:Impuestos><cfdi:Traslados><cfdi:Traslado Impuesto="002" Importe="${fields.tax ?? '16.00'}"/></cfdi:Traslados></cfdi:Impuestos>
  ${stamp}
</cfdi:Comprobante>`;
  return { fileName, content: new TextEncoder().encode(xml) };
}

function scan(fileName: string): UploadedFile {
  return { fileName, content: new TextEncoder().encode(`scan:${fileName}`) };
}

function newSession(hooks?: SessionEventHooks): SubmissionSession {
  return new SubmissionSession({
    clock: FIXED_CLOCK,
    idGenerator: createSequentialIdGenerator(),
    logger: createSafeLogger({ sink: () => undefined }),
    ...(hooks ? { hooks } : {}),
  });
}

async function readSheet(bytes: Uint8Array): Promise<Worksheet> {
  const copy = new ArrayBuffer(bytes.byteLength);
  new Uint8Array(copy).set(bytes);
  const workbook = new ExcelJS.Workbook();
  await workbook.xlsx.load(copy);
  const sheet = workbook.worksheets[0];
  if (!sheet) {
    throw new Error('sheet missing');
  }
  return sheet;
}

describe('SubmissionSession', () => {
  it('orders by date and renames matched scans (two stamped invoices)', async () => {
    const session = newSession();
    session.addInvoices([
      invoice('factura-a.xml', { date: '2024-03-02', uuid: ID_1 }),
      invoice('factura-b.xml', { date: '2024-03-01', uuid: ID_2 }),
    ]);
    session.addScannedDocuments([scan('Factura A.pdf'), scan('FACTURA_B.pdf')]);

    const build = await session.buildPackage(METADATA);

    expect(build.records.map((r) => [r.sourceFileName, r.sequenceLabel])).toEqual([
      ['factura-b.xml', '01'],
      ['factura-a.xml', '02'],
    ]);
    expect(build.associations.map((a) => a.strategy)).toEqual(['normalized-key', 'normalized-key']);
    expect([...build.entries].sort()).toEqual(['01.pdf', '02.pdf', 'MANIFEST.txt', 'SUBMISSION_IVA_FORM.xlsx']);
    expect(build.unresolved).toEqual([]);
    expect(build.report.diagnostics).toEqual([]);

    const zip = await JSZip.loadAsync(build.bytes);
    expect(await zip.file('01.pdf')?.async('string')).toBe('scan:FACTURA_B.pdf');
    expect(await zip.file('02.pdf')?.async('string')).toBe('scan:Factura A.pdf');

    const sheetBytes = await zip.file('SUBMISSION_IVA_FORM.xlsx')?.async('uint8array');
    if (!sheetBytes) {
      throw new Error('spreadsheet entry missing');
    }
    const sheet = await readSheet(sheetBytes);
    expect([sheet.getCell('A9').value, sheet.getCell('B9').value]).toEqual(['01', ID_2]);
    expect([sheet.getCell('A10').value, sheet.getCell('B10').value]).toEqual(['02', ID_1]);
  });

  it('keeps an unstamped invoice and warns at build time', async () => {
    const session = newSession();
    const [outcome] = session.addInvoices([invoice('sin-timbre.xml', { date: '2024-03-01' })]);

    expect(outcome?.record.identifier).toBe('');
    expect(outcome?.record.parseError).toBeUndefined();

    const build = await session.buildSpreadsheet(METADATA);

    expect(build.records).toHaveLength(1);
    expect(build.report.diagnostics.map((d) => [d.code, d.location])).toEqual([['ID-LENGTH', '01']]);
    expect(build.report.lines).toEqual(['WARNING ID-LENGTH [01]: Row 01: identifier is missing']);
    expect(build.report.summary.totalBySeverity.warning).toBe(1);
  });

  it('matches scans across punctuation and spacing differences', () => {
    const session = newSession();
    session.addInvoices([invoice('factura-03-final.xml', { date: '2024-03-01', uuid: ID_1 })]);
    session.addScannedDocuments([scan('Factura 03 (final).pdf')]);

    expect(session.associations()).toEqual([
      { recordId: 'rec-2', matchedFileName: 'Factura 03 (final).pdf', strategy: 'normalized-key' },
    ]);
  });

  it('builds the spreadsheet without scans but refuses the archive', async () => {
    const completed: BuildCompleteEvent[] = [];
    const session = newSession({ onBuildComplete: (event) => void completed.push(event) });
    session.addInvoices([
      invoice('a.xml', { date: '2024-03-01', uuid: ID_1 }),
      invoice('b.xml', { date: '2024-03-02', uuid: ID_2 }),
    ]);

    const sheet = await session.buildSpreadsheet(METADATA);
    expect(sheet.fileName).toBe('SUBMISSION_IVA_FORM.xlsx');
    expect(sheet.records).toHaveLength(2);

    await expect(session.buildPackage(METADATA)).rejects.toThrow(MissingUploadSetError);
    expect(completed.map((e) => [e.action, e.status, e.errorCode])).toEqual([
      ['spreadsheet', 'success', undefined],
      ['package', 'failed', 'MISSING_UPLOAD_SET'],
    ]);
  });

  it('relabels after edits and removals', async () => {
    const session = newSession();
    session.addInvoices([
      invoice('a.xml', { date: '2024-03-03', uuid: ID_1 }),
      invoice('b.xml', { date: '2024-03-01', uuid: ID_2 }),
      invoice('c.xml', { date: '2024-03-02' }),
    ]);
    expect(session.sequence().map((r) => r.sourceFileName)).toEqual(['b.xml', 'c.xml', 'a.xml']);

    const [, b] = session.listRecords();
    if (!b) {
      throw new Error('record missing');
    }
    session.updateRecord(b.recordId, { issueDate: '2024-03-04', expenseCategory: 'Gasoline' });
    expect(session.sequence().map((r) => [r.sourceFileName, r.sequenceLabel])).toEqual([
      ['c.xml', '01'],
      ['a.xml', '02'],
      ['b.xml', '03'],
    ]);

    session.removeRecord(b.recordId);
    const sheet = await session.buildSpreadsheet(METADATA);
    expect(sheet.records.map((r) => [r.sourceFileName, r.sequenceLabel])).toEqual([
      ['c.xml', '01'],
      ['a.xml', '02'],
    ]);
  });

  it('invalidates associations when uploads change', () => {
    const session = newSession();
    session.addInvoices([invoice('a.xml', { date: '2024-03-01', uuid: ID_1 })]);
    session.addScannedDocuments([scan('other.pdf')]);
    const before = session.revision;
    expect(session.associations()[0]?.strategy).toBe('none');

    session.replaceScannedDocuments([scan(`copia ${ID_1.slice(0, 8)}.pdf`)]);

    expect(session.revision).toBe(before + 1);
    expect(session.associations()[0]).toMatchObject({
      matchedFileName: 'copia A1B2C3D4.pdf',
      strategy: 'identifier-substring',
    });
  });

  it('reports unresolved records and failed parses in one list', async () => {
    const session = newSession();
    session.addInvoices([
      invoice('a.xml', { date: '2024-03-01', uuid: ID_1 }),
      { fileName: 'broken.xml', content: new TextEncoder().encode('<cfdi:Comprobante') },
    ]);
    session.addScannedDocuments([scan('a.pdf')]);

    const build = await session.buildPackage(METADATA);

    // broken.xml carries the epoch sentinel date and sorts first
    expect(build.records.map((r) => [r.sourceFileName, r.sequenceLabel])).toEqual([
      ['broken.xml', '01'],
      ['a.xml', '02'],
    ]);
    expect(build.entries).toEqual(['SUBMISSION_IVA_FORM.xlsx', '02.pdf', 'MANIFEST.txt']);
    expect(build.unresolved.map((u) => u.sequenceLabel)).toEqual(['01']);
    expect(build.report.diagnostics.map((d) => d.code)).toEqual(['PARSE-XML', 'ID-LENGTH', 'MATCH-UNRESOLVED']);
    expect(build.report.diagnostics[0]?.location).toBe('01');
    expect(build.manifest).toContain('Config: sha256:');
    expect(build.manifest).toContain('Generated: 2024-03-05T10:00:00.000Z');
  });

  it('rejects edits outside the configuration', () => {
    const session = newSession();
    const [outcome] = session.addInvoices([invoice('a.xml', { date: '2024-03-01', uuid: ID_1 })]);
    const recordId = outcome?.record.recordId ?? '';

    expect(() => session.updateRecord(recordId, { expenseCategory: 'Lodging' })).toThrow(ValidationError);
    expect(() => session.updateRecord(recordId, { currencyCode: 'EUR' })).toThrow(ValidationError);
    expect(() => session.updateRecord(recordId, { issueDate: '2024-02-30' })).toThrow(ValidationError);
    expect(() => session.updateRecord(recordId, { taxAmount: '-1.00' })).toThrow(ValidationError);
    expect(() => session.updateRecord(recordId, { totalAmount: 'n/a' })).toThrow(ValidationError);
    expect(() => session.updateRecord('rec-missing', { currencyCode: 'USD' })).toThrow('Unknown record: rec-missing');
    expect(() => session.removeRecord('rec-missing')).toThrow(ValidationError);

    expect(session.updateRecord(recordId, { currencyCode: 'USD', taxAmount: '20.00' })).toMatchObject({
      currencyCode: 'USD',
      taxAmount: '20.00',
    });
  });

  it('accepts configured enumerations', () => {
    const session = new SubmissionSession({
      config: { expenseCategories: ['Miscellaneous', 'Gasoline', 'Lodging'] },
      logger: createSafeLogger({ sink: () => undefined }),
    });
    const [outcome] = session.addInvoices([invoice('a.xml', { date: '2024-03-01' })]);

    expect(session.updateRecord(outcome?.record.recordId ?? '', { expenseCategory: 'Lodging' }).expenseCategory).toBe(
      'Lodging',
    );
  });

  it('rejects an unusable configuration up front', () => {
    expect(() => new SubmissionSession({ config: { sequenceLabelWidth: 0 } })).toThrow(ConfigurationError);
  });

  it('emits start and complete events with counts', async () => {
    const onBuildStart = vi.fn();
    const onBuildComplete = vi.fn();
    const session = newSession({ onBuildStart, onBuildComplete });
    session.addInvoices([invoice('a.xml', { date: '2024-03-01', uuid: ID_1 })]);

    await session.buildSpreadsheet(METADATA);

    expect(onBuildStart).toHaveBeenCalledWith({
      sessionId: 'ses-1',
      buildId: 'bld-3',
      action: 'spreadsheet',
      timestamp: '2024-03-05T10:00:00.000Z',
      revision: 1,
      recordCount: 1,
      uploadCount: 0,
    });
    expect(onBuildComplete).toHaveBeenCalledWith({
      sessionId: 'ses-1',
      buildId: 'bld-3',
      action: 'spreadsheet',
      timestamp: '2024-03-05T10:00:00.000Z',
      durationMs: 0,
      status: 'success',
      diagnosticCount: 0,
      unresolvedCount: 0,
    });
  });

  it('builds from the state captured when the build started', async () => {
    const onBuildStart = vi.fn();
    const session = newSession({ onBuildStart });
    session.addInvoices([invoice('factura-a.xml', { date: '2024-03-01', uuid: ID_1 })]);
    session.addScannedDocuments([scan('factura-a.pdf')]);
    onBuildStart.mockImplementation(() => {
      session.replaceScannedDocuments([scan('other.pdf')]);
      session.addInvoices([invoice('factura-b.xml', { date: '2024-02-01', uuid: ID_2 })]);
    });

    const build = await session.buildPackage(METADATA);

    expect(build.report.revision).toBe(2);
    expect(build.records.map((r) => [r.sourceFileName, r.sequenceLabel])).toEqual([['factura-a.xml', '01']]);
    expect([...build.entries].sort()).toEqual(['01.pdf', 'MANIFEST.txt', 'SUBMISSION_IVA_FORM.xlsx']);
    expect(build.unresolved).toEqual([]);
    expect(session.revision).toBe(4);
    expect(session.sequence().map((r) => r.sourceFileName)).toEqual(['factura-b.xml', 'factura-a.xml']);
  });

  it('flushes the hooks after each build, failed ones included', async () => {
    const onBuildComplete = vi.fn();
    const flush = vi.fn(() => Promise.resolve());
    const session = newSession({ onBuildComplete, flush });
    session.addInvoices([invoice('a.xml', { date: '2024-03-01', uuid: ID_1 })]);

    await session.buildSpreadsheet(METADATA);
    await expect(session.buildPackage(METADATA)).rejects.toThrow(MissingUploadSetError);

    expect(flush).toHaveBeenCalledTimes(2);
    expect(onBuildComplete).toHaveBeenCalledTimes(2);
    expect(flush.mock.invocationCallOrder[0]).toBeGreaterThan(onBuildComplete.mock.invocationCallOrder[0] ?? Infinity);
  });

  it('never logs claimant or invoice data', async () => {
    const lines: string[] = [];
    const session = new SubmissionSession({
      clock: FIXED_CLOCK,
      logger: createSafeLogger({ level: 'debug', sink: (_level, line) => lines.push(line) }),
    });
    session.addInvoices([invoice('a.xml', { date: '2024-03-01', uuid: ID_1 })]);
    session.addScannedDocuments([scan('a.pdf')]);

    await session.buildPackage(METADATA);

    const output = lines.join('\n');
    expect(lines.length).toBeGreaterThan(0);
    expect(output).not.toContain(ID_1);
    expect(output).not.toContain('AAA010101AAA');
    expect(output).not.toContain('claimant@example.com');
    expect(output).not.toContain('Test Claimant');
  });
});
