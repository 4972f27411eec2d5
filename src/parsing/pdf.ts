import { PDFLoader } from '@langchain/community/document_loaders/fs/pdf';
import { removeHyphenation } from './text';

/**
 * Extracts the text of a PDF held in memory, one entry per page.
 *
 * @returns the joined text and the per-page texts, hyphenation already repaired
 */
export async function pdfToText(bytes: Buffer): Promise<{ fullText: string; pageTexts: string[] }> {
  const loader = new PDFLoader(new Blob([new Uint8Array(bytes)], { type: 'application/pdf' }), {
    splitPages: true,
  });

  const docs = await loader.load();
  const pageTexts = docs.map((doc) => removeHyphenation(doc.pageContent));

  return {
    fullText: pageTexts.join('\n'),
    pageTexts,
  };
}
