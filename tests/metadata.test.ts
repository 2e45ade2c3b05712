import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { extractPageMetadata, formatPageMetadata } from '../src/metadata.js';

const PAGE_URL = 'https://example.com/docs/page';

describe('extractPageMetadata', () => {
  it('falls back to empty fields and the origin favicon', () => {
    assert.deepEqual(extractPageMetadata('<p>No head</p>', PAGE_URL), {
      title: '',
      description: '',
      favicon: 'https://example.com/favicon.ico',
    });
  });

  it('prefers the meta description over Open Graph', () => {
    const html =
      '<html><head>' +
      '<meta property="og:description" content="From OG">' +
      '<meta name="description" content="From meta">' +
      '</head><body></body></html>';
    assert.equal(extractPageMetadata(html, PAGE_URL).description, 'From meta');
  });

  it('uses the Open Graph description when no meta description exists', () => {
    const html =
      '<html><head><meta property="og:description" content=" Shared "></head></html>';
    assert.equal(extractPageMetadata(html, PAGE_URL).description, 'Shared');
  });

  it('skips a blank meta description', () => {
    const html =
      '<html><head><meta name="description" content="  ">' +
      '<meta property="og:description" content="Shared"></head></html>';
    assert.equal(extractPageMetadata(html, PAGE_URL).description, 'Shared');
  });

  it('resolves relative icon and image references against the page', () => {
    const html =
      '<html><head><title>Docs</title>' +
      '<link rel="shortcut icon" href="icon.ico">' +
      '<meta property="og:image" content="https://cdn.example.org/cover.png">' +
      '</head></html>';
    assert.deepEqual(extractPageMetadata(html, PAGE_URL), {
      title: 'Docs',
      description: '',
      image: 'https://cdn.example.org/cover.png',
      favicon: 'https://example.com/docs/icon.ico',
    });
  });

  it('ignores an empty Open Graph image', () => {
    const html = '<html><head><meta property="og:image" content=""></head></html>';
    assert.equal(extractPageMetadata(html, PAGE_URL).image, undefined);
  });
});

describe('formatPageMetadata', () => {
  it('renders missing images as None', () => {
    assert.equal(
      formatPageMetadata(PAGE_URL, {
        title: 'Docs',
        description: 'About',
        favicon: 'https://example.com/favicon.ico',
      }),
      `## URL Metadata for ${PAGE_URL}\n\n` +
        '**Title:** Docs\n\n' +
        '**Description:** About\n\n' +
        '**Image:** None\n\n' +
        '**Favicon:** https://example.com/favicon.ico'
    );
  });
});
