import { beforeEach, describe, expect, it, vi } from 'vitest';
import { UnparseableDocumentError, UnsupportedDocumentError } from '../errors';
import { createSilentLogger } from '../logger';
import { decodeText, detectFormat, DocumentParser } from './parser';

const pdfPages = vi.hoisted((): { pages: string[]; fail: boolean } => ({ pages: [], fail: false }));

vi.mock('@langchain/community/document_loaders/fs/pdf', () => ({
  PDFLoader: class {
    async load() {
      if (pdfPages.fail) throw new Error('bad xref table');
      return pdfPages.pages.map((pageContent) => ({ pageContent, metadata: {} }));
    }
  },
}));

describe('detectFormat', () => {
  it('prefers the declared mime type', () => {
    expect(detectFormat({ name: 'resume', mimeType: 'application/pdf' })).toBe('pdf');
    expect(detectFormat({ name: 'resume.bin', mimeType: 'text/plain; charset=utf-8' })).toBe('text');
  });

  it('falls back to the extension', () => {
    expect(detectFormat({ name: 'Resume.PDF', mimeType: 'application/octet-stream' })).toBe('pdf');
    expect(detectFormat({ name: 'notes.txt' })).toBe('text');
  });

  it('rejects anything else', () => {
    expect(detectFormat({ name: 'resume.docx' })).toBeNull();
  });
});

describe('decodeText', () => {
  it('decodes UTF-8', () => {
    expect(decodeText(Buffer.from('Zoë – engineer', 'utf-8'))).toBe('Zoë – engineer');
  });

  it('falls back to latin-1 for invalid UTF-8', () => {
    expect(decodeText(Buffer.from([0x5a, 0x6f, 0xeb]))).toBe('Zoë');
  });
});

describe('DocumentParser', () => {
  const parser = new DocumentParser(createSilentLogger());

  beforeEach(() => {
    pdfPages.pages = [];
    pdfPages.fail = false;
  });

  it('parses and cleans a text upload', async () => {
    const doc = await parser.parse(
      { name: 'jane.txt', bytes: Buffer.from('Jane Doe\n\n  Python   developer\u0000') },
      'resume'
    );
    expect(doc.role).toBe('resume');
    expect(doc.format).toBe('text');
    expect(doc.cleanedText).toBe('Jane Doe Python developer');
    expect(doc.id).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/);
  });

  it('gives the same file the same id', async () => {
    const file = { name: 'jane.txt', bytes: Buffer.from('Python developer') };
    const a = await parser.parse(file, 'resume');
    const b = await parser.parse(file, 'resume');
    expect(a.id).toBe(b.id);
  });

  it('joins PDF pages and repairs hyphenation', async () => {
    pdfPages.pages = ['Data engi-\nneer', 'Spark and SQL'];
    const doc = await parser.parse({ name: 'cv.pdf', bytes: Buffer.from('%PDF-1.4') }, 'resume');
    expect(doc.format).toBe('pdf');
    expect(doc.cleanedText).toBe('Data engineer Spark and SQL');
  });

  it('signals an unparseable document when no text comes out', async () => {
    pdfPages.pages = ['  ', '\n'];
    await expect(parser.parse({ name: 'scan.pdf', bytes: Buffer.from('%PDF-1.4') }, 'resume')).rejects.toThrow(
      UnparseableDocumentError
    );
  });

  it('wraps PDF extraction errors as unparseable', async () => {
    pdfPages.fail = true;
    await expect(parser.parse({ name: 'broken.pdf', bytes: Buffer.from('junk') }, 'resume')).rejects.toThrow(
      'Unparseable document "broken.pdf": PDF text extraction failed'
    );
  });

  it('rejects unsupported types', async () => {
    await expect(parser.parse({ name: 'cv.docx', bytes: Buffer.from('x') }, 'resume')).rejects.toThrow(
      UnsupportedDocumentError
    );
  });

  it('cleans pasted text and rejects it when empty', () => {
    expect(parser.fromText('  Backend role:\nGo, SQL ', 'Pasted JD', 'jd').cleanedText).toBe('Backend role: Go, SQL');
    expect(() => parser.fromText(' \n ', 'Pasted JD', 'jd')).toThrow(UnparseableDocumentError);
  });
});
