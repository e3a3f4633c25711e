import { describe, expect, it } from 'vitest';

import { DocumentFormatError } from '../../src/errors.js';
import { extractAnchors, findKdnPdfLink, findUnXmlLink } from '../../src/sources/links.js';

const BASE = 'https://lists.test/en/page';

describe('extractAnchors', () => {
  it('resolves relative links and decodes entities', () => {
    const html = `
      <a name="top">no href</a>
      <a href="#section">jump</a>
      <a href="mailto:desk@lists.test">mail</a>
      <a class="btn" href="/files/consolidated.xml"><span>Download</span> XML</a>
      <a href='https://lists.test/files/SENARAI_KDN.pdf?lang=en&amp;v=2'>PDF</a>
    `;

    expect(extractAnchors(html, BASE)).toEqual([
      { href: 'https://lists.test/files/consolidated.xml', text: 'Download XML' },
      { href: 'https://lists.test/files/SENARAI_KDN.pdf?lang=en&v=2', text: 'PDF' },
    ]);
  });
});

describe('findUnXmlLink', () => {
  it('returns the first link mentioning xml', () => {
    const html = '<a href="/about">About</a><a href="/files/list.XML">List</a><a href="/other.xml">Other</a>';

    expect(findUnXmlLink(html, BASE)).toBe('https://lists.test/files/list.XML');
  });

  it('fails when the page has no XML link', () => {
    expect(() => findUnXmlLink('<a href="/about">About</a>', BASE)).toThrow(DocumentFormatError);
  });
});

describe('findKdnPdfLink', () => {
  it('skips the XML rendition of the list', () => {
    const html =
      '<a href="/f/SENARAI_KDN_2024.pdf.xml">xml</a>' +
      '<a href="/f/other.pdf">other</a>' +
      '<a href="/f/SENARAI_KDN_2024.pdf">pdf</a>';

    expect(findKdnPdfLink(html, BASE)).toBe('https://lists.test/f/SENARAI_KDN_2024.pdf');
  });

  it('fails when the page has no list PDF', () => {
    expect(() => findKdnPdfLink('<a href="/f/other.pdf">other</a>', BASE)).toThrow(
      'no list PDF link found on https://lists.test/en/page',
    );
  });
});
