import * as fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';
import AdmZip from 'adm-zip';
import { ErrorKind, RcaError } from '../src/errors';
import { EvidenceCollector } from '../src/evidence/EvidenceCollector';
import { EvidenceSource } from '../src/evidence/EvidenceSource';
import { FileEvidenceSource } from '../src/evidence/FileEvidenceSource';
import { TicketEvidenceSource } from '../src/evidence/TicketEvidenceSource';
import { UrlEvidenceSource, htmlToText } from '../src/evidence/UrlEvidenceSource';
import { TicketDetails } from '../src/ticketing/types';
import { EvidenceItem, EvidenceKind, Result, err, ok } from '../src/types';

jest.mock('pdf-parse', () =>
  jest.fn(async (data: Buffer) => {
    const raw = data.toString('utf-8');
    if (!raw.startsWith('%PDF-')) throw new Error('Invalid PDF structure');
    const body = raw.slice(raw.indexOf('\n') + 1);
    return { text: body, numpages: body.split('\f').length };
  })
);

const FILE_SETTINGS = { allowedExtensions: ['.log', '.txt', '.zip'], maxFileSizeMb: 1, redact: true };

const PDF_SETTINGS = { ...FILE_SETTINGS, allowedExtensions: ['.txt', '.pdf', '.zip'] };

function errorOf<T>(result: Result<T>): RcaError {
  if (result.ok) throw new Error('expected a failure');
  return result.error;
}

function valueOf<T>(result: Result<T>): T {
  if (!result.ok) throw result.error;
  return result.value;
}

describe('FileEvidenceSource', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'rca-evidence-'));
  });

  afterEach(() => {
    fs.removeSync(dir);
  });

  test('reads and redacts a text file', async () => {
    const filePath = path.join(dir, 'app.log');
    const content = 'User user@example.com failed\nretrying';
    fs.writeFileSync(filePath, content);

    const item = valueOf(await new FileEvidenceSource(FILE_SETTINGS).fetch(filePath));

    expect(item.kind).toBe('file');
    expect(item.identifier).toBe(filePath);
    expect(item.text).toBe('User [REDACTED-EMAIL] failed\nretrying');
    expect(item.metadata.fileName).toBe('app.log');
    expect(item.metadata.mediaType).toBe('text/plain');
    expect(item.metadata.sizeBytes).toBe(String(Buffer.byteLength(content)));
    expect(item.metadata.redacted).toBe('true');
    expect(item.metadata.redactionRules).toBe('Email');
    expect(item.metadata.sha256).toHaveLength(64);
    expect(Object.isFrozen(item)).toBe(true);
  });

  test('leaves text alone when redaction is off', async () => {
    const filePath = path.join(dir, 'app.log');
    fs.writeFileSync(filePath, 'User user@example.com failed');

    const item = valueOf(await new FileEvidenceSource({ ...FILE_SETTINGS, redact: false }).fetch(filePath));

    expect(item.text).toBe('User user@example.com failed');
    expect(item.metadata.redacted).toBe('false');
    expect(item.metadata.redactionRules).toBe('');
  });

  test('reports a missing file', async () => {
    const missing = path.join(dir, 'missing.log');

    const error = errorOf(await new FileEvidenceSource(FILE_SETTINGS).fetch(missing));

    expect(error.kind).toBe(ErrorKind.EvidenceError);
    expect(error.message).toBe(`file not found: ${missing}`);
  });

  test('rejects directories, disallowed extensions and oversized files', async () => {
    const source = new FileEvidenceSource({ ...FILE_SETTINGS, maxFileSizeMb: 1 / 1024 });
    fs.mkdirSync(path.join(dir, 'logs.log'));
    fs.writeFileSync(path.join(dir, 'tool.exe'), 'binary');
    fs.writeFileSync(path.join(dir, 'README'), 'text');
    fs.writeFileSync(path.join(dir, 'big.log'), 'x'.repeat(2000));

    expect(errorOf(await source.fetch(path.join(dir, 'logs.log'))).message).toBe(`not a regular file: ${path.join(dir, 'logs.log')}`);
    expect(errorOf(await source.fetch(path.join(dir, 'tool.exe'))).message).toBe('file extension not allowed: .exe');
    expect(errorOf(await source.fetch(path.join(dir, 'README'))).message).toBe('file extension not allowed: (none)');
    expect(errorOf(await source.fetch(path.join(dir, 'big.log'))).message).toBe('file too large: 2000 bytes (max 1024)');
  });

  test('expands the text entries of a zip bundle', async () => {
    const zipPath = path.join(dir, 'bundle.zip');
    const zip = new AdmZip();
    zip.addFile('a.log', Buffer.from('first'));
    zip.addFile('b.txt', Buffer.from('second'));
    zip.addFile('c.exe', Buffer.from('skipped'));
    zip.writeZip(zipPath);

    const item = valueOf(await new FileEvidenceSource(FILE_SETTINGS).fetch(zipPath));

    expect(item.text).toBe('--- a.log ---\nfirst\n\n--- b.txt ---\nsecond');
    expect(item.metadata.entries).toBe('2');
    expect(item.metadata.mediaType).toBe('application/zip');
  });

  test('a zip without readable entries is an evidence error', async () => {
    const zipPath = path.join(dir, 'bundle.zip');
    const zip = new AdmZip();
    zip.addFile('tool.exe', Buffer.from('binary'));
    zip.writeZip(zipPath);

    const error = errorOf(await new FileEvidenceSource(FILE_SETTINGS).fetch(zipPath));

    expect(error.message).toBe('cannot read zip archive: archive contains no readable text files');
  });

  test('extracts and redacts the text of a PDF', async () => {
    const filePath = path.join(dir, 'incident.pdf');
    fs.writeFileSync(filePath, '%PDF-1.4\nDisk full on node-3\fPaged ops@example.com\n');

    const item = valueOf(await new FileEvidenceSource(PDF_SETTINGS).fetch(filePath));

    expect(item.text).toBe('Disk full on node-3\fPaged [REDACTED-EMAIL]');
    expect(item.metadata.mediaType).toBe('application/pdf');
    expect(item.metadata.pages).toBe('2');
    expect(item.metadata.redactionRules).toBe('Email');
  });

  test('a PDF without a text layer is an evidence error', async () => {
    const filePath = path.join(dir, 'scan.pdf');
    fs.writeFileSync(filePath, '%PDF-1.4\n  \n');

    const error = errorOf(await new FileEvidenceSource(PDF_SETTINGS).fetch(filePath));

    expect(error.kind).toBe(ErrorKind.EvidenceError);
    expect(error.message).toBe('cannot read PDF: no extractable text (scanned or image-only PDF?)');
  });

  test('an unreadable PDF is an evidence error', async () => {
    const filePath = path.join(dir, 'broken.pdf');
    fs.writeFileSync(filePath, 'plain bytes');

    const error = errorOf(await new FileEvidenceSource(PDF_SETTINGS).fetch(filePath));

    expect(error.message).toBe('cannot read PDF: Invalid PDF structure');
  });

  test('PDF entries of a zip bundle are extracted', async () => {
    const zipPath = path.join(dir, 'bundle.zip');
    const zip = new AdmZip();
    zip.addFile('notes.txt', Buffer.from('first'));
    zip.addFile('report.pdf', Buffer.from('%PDF-1.7\nQueue backlog grew'));
    zip.writeZip(zipPath);

    const item = valueOf(await new FileEvidenceSource(PDF_SETTINGS).fetch(zipPath));

    expect(item.text).toBe('--- notes.txt ---\nfirst\n\n--- report.pdf ---\nQueue backlog grew');
    expect(item.metadata.entries).toBe('2');
  });

  test('a corrupt zip is an evidence error', async () => {
    const zipPath = path.join(dir, 'broken.zip');
    fs.writeFileSync(zipPath, 'not really a zip');

    const error = errorOf(await new FileEvidenceSource(FILE_SETTINGS).fetch(zipPath));

    expect(error.kind).toBe(ErrorKind.EvidenceError);
    expect(error.message.startsWith('cannot read zip archive: ')).toBe(true);
  });
});

describe('UrlEvidenceSource', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  const PAGE =
    '<html><head><title>Incident &amp; Status</title><style>p{}</style></head>' +
    '<body><h1>Outage</h1><p>DB&nbsp;down</p><script>x()</script></body></html>';

  test('keeps the readable text and title of a page', async () => {
    jest
      .spyOn(globalThis, 'fetch')
      .mockResolvedValue(new Response(PAGE, { status: 200, headers: { 'content-type': 'text/html; charset=utf-8' } }));

    const item = valueOf(await new UrlEvidenceSource({ timeoutMs: 1000 }).fetch('https://status.example/incident/42'));

    expect(item.text).toBe('Outage\nDB down');
    expect(item.metadata).toEqual({
      url: 'https://status.example/incident/42',
      status: '200',
      contentType: 'text/html; charset=utf-8',
      title: 'Incident & Status'
    });
  });

  test('keeps plain text as is', async () => {
    jest
      .spyOn(globalThis, 'fetch')
      .mockResolvedValue(new Response('  all systems normal \n', { status: 200, headers: { 'content-type': 'text/plain' } }));

    const item = valueOf(await new UrlEvidenceSource({ timeoutMs: 1000 }).fetch('http://status.example/raw'));

    expect(item.text).toBe('all systems normal');
    expect(item.metadata.title).toBe('');
  });

  test('reports HTTP errors', async () => {
    jest.spyOn(globalThis, 'fetch').mockResolvedValue(new Response('nope', { status: 404 }));

    const error = errorOf(await new UrlEvidenceSource({ timeoutMs: 1000 }).fetch('https://status.example/missing'));

    expect(error.message).toBe('HTTP 404 from https://status.example/missing');
  });

  test('releases the body of an error response', async () => {
    const response = new Response('upstream down', { status: 503 });
    const body = response.body;
    if (!body) throw new Error('expected a body');
    const cancel = jest.spyOn(body, 'cancel');
    jest.spyOn(globalThis, 'fetch').mockResolvedValue(response);

    const error = errorOf(await new UrlEvidenceSource({ timeoutMs: 1000 }).fetch('https://status.example/down'));

    expect(error.message).toBe('HTTP 503 from https://status.example/down');
    expect(cancel).toHaveBeenCalledTimes(1);
  });

  test('validates the URL before fetching', async () => {
    const fetchSpy = jest.spyOn(globalThis, 'fetch');
    const source = new UrlEvidenceSource({ timeoutMs: 1000 });

    expect(errorOf(await source.fetch('not a url')).message).toBe('invalid URL: not a url');
    expect(errorOf(await source.fetch('ftp://files.example/log.txt')).message).toBe('unsupported URL scheme: ftp:');
    expect(fetchSpy).not.toHaveBeenCalled();
  });

  test('gives up after the timeout', async () => {
    jest.spyOn(globalThis, 'fetch').mockImplementation(
      (_input, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () => reject(new Error('aborted')));
        })
    );

    const error = errorOf(await new UrlEvidenceSource({ timeoutMs: 20 }).fetch('https://slow.example/'));

    expect(error.message).toBe('no response within 20ms');
  });

  test('htmlToText turns line breaks and list items into lines', () => {
    expect(htmlToText('<ul><li>one</li><li>two &lt;b&gt;</li></ul>first<br/>second')).toBe('one\ntwo <b>\nfirst\nsecond');
  });
});

describe('TicketEvidenceSource', () => {
  const details: TicketDetails = {
    key: 'OPS-12',
    summary: 'Login fails',
    status: 'Open',
    priority: 'High',
    issueType: 'Bug',
    description: 'Users get 500',
    comments: [{ author: 'sre-bot', created: '2026-01-01', body: 'Seen again ' }],
    links: ['relates to OPS-7']
  };

  test('renders the ticket and its metadata', async () => {
    const keys: string[] = [];
    const source = new TicketEvidenceSource({
      getTicket: async (key) => {
        keys.push(key);
        return details;
      }
    });

    const item = valueOf(await source.fetch(' ops-12 '));

    expect(keys).toEqual(['OPS-12']);
    expect(item.identifier).toBe('OPS-12');
    expect(item.text).toBe(
      [
        'Ticket: OPS-12',
        'Summary: Login fails',
        'Type: Bug',
        'Status: Open',
        'Priority: High',
        '',
        'Description:',
        'Users get 500',
        '',
        'Comments:',
        '- sre-bot (2026-01-01): Seen again',
        '',
        'Linked issues:',
        '- relates to OPS-7'
      ].join('\n')
    );
    expect(item.metadata).toEqual({
      key: 'OPS-12',
      summary: 'Login fails',
      status: 'Open',
      priority: 'High',
      linkedIssues: '1'
    });
  });

  test('an empty description is shown as none', async () => {
    const source = new TicketEvidenceSource({
      getTicket: async () => ({ ...details, description: '', comments: [], links: [] })
    });

    const item = valueOf(await source.fetch('OPS-12'));

    expect(item.text.endsWith('Description:\n(none)')).toBe(true);
  });

  test('reader failures become evidence errors', async () => {
    const source = new TicketEvidenceSource({
      getTicket: () => Promise.reject(new Error('Jira GET /rest/api/2/issue/OPS-99 failed (404)'))
    });

    const error = errorOf(await source.fetch('OPS-99'));

    expect(error.kind).toBe(ErrorKind.EvidenceError);
    expect(error.message).toBe('Jira GET /rest/api/2/issue/OPS-99 failed (404)');
  });
});

describe('EvidenceCollector', () => {
  function item(kind: EvidenceKind, identifier: string): EvidenceItem {
    return { kind, identifier, text: `text of ${identifier}`, metadata: {} };
  }

  class FakeSource implements EvidenceSource {
    constructor(
      readonly kind: EvidenceKind,
      private handler: (identifier: string) => Promise<Result<EvidenceItem>>
    ) {}

    fetch(identifier: string): Promise<Result<EvidenceItem>> {
      return this.handler(identifier);
    }
  }

  test('keeps request order and separates failures', async () => {
    const files = new FakeSource('file', async (id) =>
      id === 'bad.log' ? err(new RcaError(ErrorKind.EvidenceError, 'file not found: bad.log')) : ok(item('file', id))
    );
    const urls = new FakeSource('url', async (id) => ok(item('url', id)));
    const collector = new EvidenceCollector([files, urls], { timeoutMs: 1000 });
    const preCollected = item('ticket', 'OPS-1');

    const collected = await collector.collect([
      { kind: 'url', identifier: 'https://a.example' },
      { kind: 'file', identifier: 'bad.log' },
      preCollected,
      { kind: 'file', identifier: 'good.log' }
    ]);

    expect(collected.items.map((i) => i.identifier)).toEqual(['https://a.example', 'OPS-1', 'good.log']);
    expect(collected.failures).toHaveLength(1);
    expect(collected.failures[0].ref).toEqual({ kind: 'file', identifier: 'bad.log' });
    expect(collected.failures[0].error.message).toBe('file not found: bad.log');
  });

  test('reports kinds without a source', async () => {
    const collector = new EvidenceCollector([], { timeoutMs: 1000 });

    const result = await collector.fetch({ kind: 'ticket', identifier: 'OPS-1' });

    expect(errorOf(result).message).toBe('no source configured for ticket evidence');
  });

  test('bounds each fetch by the timeout', async () => {
    const hung = new FakeSource('url', () => new Promise<Result<EvidenceItem>>(() => undefined));
    const collector = new EvidenceCollector([hung], { timeoutMs: 20 });

    const result = await collector.fetch({ kind: 'url', identifier: 'https://slow.example' });

    expect(errorOf(result).message).toBe('no result within 20ms');
  });

  test('a source that throws is turned into a failure', async () => {
    const broken = new FakeSource('file', () => Promise.reject(new Error('EACCES: permission denied')));
    const collector = new EvidenceCollector([broken], { timeoutMs: 1000 });

    const result = await collector.fetch({ kind: 'file', identifier: 'secret.log' });

    expect(errorOf(result)).toMatchObject({ kind: ErrorKind.EvidenceError, message: 'EACCES: permission denied' });
  });

  test('a source that throws before returning a promise only fails its own item', async () => {
    const broken = new FakeSource('file', () => {
      throw new Error('EMFILE: too many open files');
    });
    const urls = new FakeSource('url', async (id) => ok(item('url', id)));
    const collector = new EvidenceCollector([broken, urls], { timeoutMs: 1000 });

    const collected = await collector.collect([
      { kind: 'file', identifier: 'app.log' },
      { kind: 'url', identifier: 'https://a.example' }
    ]);

    expect(collected.items.map((i) => i.identifier)).toEqual(['https://a.example']);
    expect(collected.failures).toHaveLength(1);
    expect(collected.failures[0].error).toMatchObject({ kind: ErrorKind.EvidenceError, message: 'EMFILE: too many open files' });
  });
});
