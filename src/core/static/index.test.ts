import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { snapshot } from '../../test-utils/fixtures';
import { detectIssues } from '../detector';
import { fingerprintStack } from '../fingerprint';
import {
    extractElementFactsFromHtml,
    extractPageFactsFromHtml,
    findHtmlFiles,
    mergePageFacts,
    readPageFacts,
} from './index';

const HTML = `<!doctype html>
<html>
<head>
  <meta name="generator" content="Astro v4">
  <meta property="og:title" content="Shop">
  <link rel="stylesheet" href="/styles/main.scss">
  <script src="/_next/static/chunks/app.js"></script>
  <script>window.__vite__ = {}; if (window.jQuery == null) {}</script>
  <script id="__NEXT_DATA__" type="application/json">{"props":{}}</script>
  <style>:root { --brand: #333; --gap: 1rem; }</style>
</head>
<body>
  <div id="__next" data-reactroot="" class="min-h-screen flex">
    <nav class="navbar top" data-state="open"><a href="/">Home</a><a href="/cart" aria-label="Cart"></a></nav>
    <img src="/a.png" class="hero-img">
    <div style="display: none" hidden class="toast"></div>
  </div>
</body>
</html>`;

describe('extractPageFactsFromHtml', () => {
    it('collects page-wide facts from markup', () => {
        const facts = extractPageFactsFromHtml(HTML);

        expect(facts.scripts).toEqual(['/_next/static/chunks/app.js']);
        expect(facts.stylesheets).toEqual(['/styles/main.scss']);
        expect(facts.metas).toEqual([
            { name: 'generator', content: 'Astro v4' },
            { name: 'og:title', content: 'Shop' },
        ]);
        expect(facts.globals).toEqual(['__vite__', '__NEXT_DATA__']);
        expect(facts.htmlHints).toEqual(['nextjs_data', 'react_root', 'nextjs_root']);
        expect(facts.classNames).toEqual(['min-h-screen', 'flex', 'navbar', 'top', 'hero-img', 'toast']);
        expect(facts.dataAttributes).toEqual(['data-reactroot', 'data-state']);
        expect(facts.attributes).toEqual(['data-reactroot']);
        expect(facts.inlineStyleCount).toBe(1);
        expect(facts.cssVariables).toEqual(['--brand', '--gap']);
    });

    it('feeds the fingerprinter', () => {
        const result = fingerprintStack(extractPageFactsFromHtml(HTML));

        expect(result.primaryFramework).toBe('Next.js');
        expect(result.hasReact).toBe(true);
        expect(result.hasVite).toBe(true);
        expect(result.usesSass).toBe(true);
    });

    it('returns empty facts for empty markup', () => {
        const facts = extractPageFactsFromHtml('');

        expect(facts.scripts).toEqual([]);
        expect(facts.globals).toEqual([]);
        expect(facts.classNames).toEqual([]);
        expect(facts.inlineStyleCount).toBe(0);
    });
});

describe('extractElementFactsFromHtml', () => {
    it('extracts elements in document order without geometry', () => {
        const elements = extractElementFactsFromHtml(HTML, 'nav, a, img, div');

        expect(elements.map(el => el.selector)).toEqual(['#__next', 'nav.navbar.top', 'a', 'a', 'img.hero-img', 'div.toast']);
        expect(elements[0]).toMatchObject({ tagName: 'div', elementId: '__next', childrenCount: 3, textContent: 'Home' });
        expect(elements[3]).toMatchObject({ ariaLabel: 'Cart', textContent: undefined });
        expect(elements[5].isVisible).toBe(false);
        expect(elements.every(el => el.boundingBox === undefined)).toBe(true);
    });

    it('stops at the cap', () => {
        expect(extractElementFactsFromHtml(HTML, 'nav, a, img, div', 2)).toHaveLength(2);
    });

    it('lets the detector run on static facts', () => {
        const elements = extractElementFactsFromHtml(HTML, 'body *');
        const issues = detectIssues(snapshot(elements));

        expect(issues.map(issue => [issue.kind, issue.selector])).toEqual([['accessibility_missing', 'img.hero-img']]);
    });
});

describe('mergePageFacts', () => {
    it('unions lists and sums inline styles', () => {
        const merged = mergePageFacts([
            extractPageFactsFromHtml('<div class="a b" style="color:red"></div>'),
            extractPageFactsFromHtml('<div class="b c" style="color:blue"></div>'),
        ]);

        expect(merged.classNames).toEqual(['a', 'b', 'c']);
        expect(merged.inlineStyleCount).toBe(2);
    });
});

describe('local files', () => {
    let dir: string;

    beforeEach(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'ui-lens-static-'));
        fs.mkdirSync(path.join(dir, 'sub'));
        fs.mkdirSync(path.join(dir, 'node_modules'));
        fs.writeFileSync(path.join(dir, 'index.html'), '<div class="btn btn-primary"></div>');
        fs.writeFileSync(path.join(dir, 'sub', 'about.html'), '<script>window.jQuery = function () {};</script>');
        fs.writeFileSync(path.join(dir, 'node_modules', 'vendor.html'), '<div class="ignored"></div>');
        fs.writeFileSync(path.join(dir, 'notes.txt'), 'not html');
    });

    afterEach(() => {
        fs.rmSync(dir, { recursive: true, force: true });
    });

    it('finds html files under a folder, skipping node_modules', async () => {
        expect(await findHtmlFiles(dir)).toEqual([
            path.join(dir, 'index.html'),
            path.join(dir, 'sub', 'about.html'),
        ]);
    });

    it('accepts a single file', async () => {
        const file = path.join(dir, 'index.html');
        expect(await findHtmlFiles(file)).toEqual([file]);
    });

    it('rejects a missing path', async () => {
        await expect(findHtmlFiles(path.join(dir, 'missing'))).rejects.toThrow('No such file or directory');
    });

    it('merges facts across a folder', async () => {
        const facts = await readPageFacts(dir);

        expect(facts.classNames).toEqual(['btn', 'btn-primary']);
        expect(facts.globals).toEqual(['jQuery']);
    });
});
