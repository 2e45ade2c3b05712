import assert from 'node:assert/strict';
import { readFileSync } from 'node:fs';
import { describe, it } from 'node:test';

import {
  MAIN_CONTENT_SELECTORS,
  selectMainContent,
} from '../src/main-content.js';

function page(body: string): string {
  return `<html><body>${body}</body></html>`;
}

describe('MAIN_CONTENT_SELECTORS', () => {
  it('loads the curated list in priority order', () => {
    assert.equal(MAIN_CONTENT_SELECTORS[0], 'article');
    assert.equal(MAIN_CONTENT_SELECTORS[1], 'article[role="article"]');
    assert.equal(MAIN_CONTENT_SELECTORS.at(-1), '.mw-parser-output');
  });

  it('is published alongside the compiled code', () => {
    const manifest: unknown = JSON.parse(
      readFileSync(new URL('../package.json', import.meta.url), 'utf8')
    );
    assert.ok(manifest !== null && typeof manifest === 'object');
    assert.ok('files' in manifest && Array.isArray(manifest.files));
    assert.ok(manifest.files.includes('data'));
  });
});

describe('selectMainContent', () => {
  it('prefers a curated match over navigation', () => {
    assert.deepEqual(selectMainContent(page('<nav>X</nav><article>Y</article>')), {
      kind: 'main',
      html: '<article>Y</article>',
    });
  });

  it('follows selector priority rather than document order', () => {
    const html = page('<main>From main</main><article>From article</article>');
    assert.deepEqual(selectMainContent(html), {
      kind: 'main',
      html: '<article>From article</article>',
    });
  });

  it('skips curated matches without text', () => {
    const html = page('<article>   </article><main>Body text</main>');
    assert.deepEqual(selectMainContent(html), {
      kind: 'main',
      html: '<main>Body text</main>',
    });
  });

  it('only considers the first element matching a selector', () => {
    const html = page('<article> </article><article>Second</article><main>M</main>');
    assert.deepEqual(selectMainContent(html), {
      kind: 'main',
      html: '<main>M</main>',
    });
  });

  it('scores class and id names when no curated selector matches', () => {
    const short = 'a'.repeat(190);
    const long = 'b'.repeat(250);
    const html = page(
      `<div class="sidebar">${'c'.repeat(400)}</div>` +
        `<div class="text-one">${short}</div>` +
        `<div id="story-two">${long}</div>`
    );
    assert.deepEqual(selectMainContent(html), {
      kind: 'main',
      html: `<div id="story-two">${long}</div>`,
    });
  });

  it('counts chrome-like names only next to a content name', () => {
    const kept = 'e'.repeat(300);
    const html = page(
      `<div class="sidebar-nav">${'f'.repeat(400)}</div>` +
        `<div class="comment-body">${kept}</div>`
    );
    assert.deepEqual(selectMainContent(html), {
      kind: 'main',
      html: `<div class="comment-body">${kept}</div>`,
    });
  });

  it('keeps the first candidate on a tie', () => {
    const text = 'd'.repeat(200);
    const html = page(
      `<div class="text-one">${text}</div><div class="text-two">${text}</div>`
    );
    assert.deepEqual(selectMainContent(html), {
      kind: 'main',
      html: `<div class="text-one">${text}</div>`,
    });
  });

  it('rejects candidates under 180 code points and falls back to body', () => {
    const html = page(`<div class="text-block">${'\u{1F600}'.repeat(179)}</div>`);
    const selected = selectMainContent(html);
    assert.ok(selected);
    assert.equal(selected.kind, 'body');
    assert.ok(selected.html.startsWith('<body><div class="text-block">'));
  });

  it('handles deeply nested markup', () => {
    const depth = 20_000;
    const html = page(`${'<div>'.repeat(depth)}deep${'</div>'.repeat(depth)}`);
    assert.equal(selectMainContent(html)?.kind, 'body');
  });

  it('returns undefined for blank input or a document without text', () => {
    assert.equal(selectMainContent(''), undefined);
    assert.equal(selectMainContent('   \n'), undefined);
    assert.equal(selectMainContent(page('   ')), undefined);
  });
});
