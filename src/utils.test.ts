import { describe, expect, it } from 'vitest';
import { candidateNameFromFile, generateDocumentId } from './utils';

describe('generateDocumentId', () => {
  it('is a stable UUID-shaped hash of role, name and content', () => {
    const id = generateDocumentId('resume', 'jane.txt', 'Python');

    expect(id).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/);
    expect(generateDocumentId('resume', 'jane.txt', Buffer.from('Python'))).toBe(id);
  });

  it('changes with any of its inputs', () => {
    const id = generateDocumentId('resume', 'jane.txt', 'Python');

    expect(generateDocumentId('jd', 'jane.txt', 'Python')).not.toBe(id);
    expect(generateDocumentId('resume', 'john.txt', 'Python')).not.toBe(id);
    expect(generateDocumentId('resume', 'jane.txt', 'Java')).not.toBe(id);
  });
});

describe('candidateNameFromFile', () => {
  it('title-cases the file name without its extension', () => {
    expect(candidateNameFromFile('jane_doe-cv.pdf')).toBe('Jane Doe Cv');
    expect(candidateNameFromFile('JOHN SMITH.txt')).toBe('John Smith');
  });

  it('falls back when nothing is left', () => {
    expect(candidateNameFromFile('.pdf')).toBe('Candidate');
  });
});
