import * as cheerio from 'cheerio';
import * as fs from 'fs';
import * as path from 'path';
import { glob } from 'glob';
import { ElementFacts, PageFacts } from '../../types';

const MAX_CLASS_NAMES = 500;
const MAX_CSS_VARIABLES = 50;

// window.__NUXT__ = ..., self.__vite__ = ...; "==" comparisons are not assignments
const GLOBAL_ASSIGNMENT = /\b(?:window|self|globalThis)\.([A-Za-z_$][\w$]*)\s*=(?!=)/g;
const CSS_VARIABLE_DECLARATION = /(--[A-Za-z0-9_-]+)\s*:/g;

const INLINE_SCRIPT_HINTS: Array<[string, string]> = [
    ['__NEXT_DATA__', 'nextjs_data'],
    ['__NUXT__', 'nuxt_data'],
    ['__GATSBY', 'gatsby_data'],
    ['__remixContext', 'remix_data'],
];

const STRUCTURAL_HINTS: Array<[string, string]> = [
    ['[data-reactroot]', 'react_root'],
    ['#__next', 'nextjs_root'],
    ['#__nuxt', 'nuxt_root'],
    ['[ng-version]', 'angular_version'],
    ['astro-island', 'astro_island'],
];

function isFrameworkAttribute(name: string): boolean {
    return name.startsWith('ng-')
        || name.startsWith('v-')
        || name.startsWith('_ng')
        || name.includes('react')
        || name.includes('svelte');
}

function splitClasses(value: string | undefined): string[] {
    return (value || '').split(/\s+/).filter(Boolean);
}

/**
 * Page-wide facts from markup alone. Nothing executes, so globals are read off
 * inline-script assignments and the CSS variables off inline <style> blocks.
 */
export function extractPageFactsFromHtml(html: string): PageFacts {
    const $ = cheerio.load(html);

    const scripts: string[] = [];
    $('script[src]').each((_, el) => {
        const src = $(el).attr('src');
        if (src) scripts.push(src);
    });

    const globals = new Set<string>();
    const htmlHints: string[] = [];
    $('script:not([src])').each((_, el) => {
        const content = $(el).text();
        for (const [marker, hint] of INLINE_SCRIPT_HINTS) {
            if (content.includes(marker)) htmlHints.push(hint);
        }
        for (const match of content.matchAll(GLOBAL_ASSIGNMENT)) {
            globals.add(match[1]);
        }
    });
    // Next.js ships its page data as <script id="__NEXT_DATA__" type="application/json">
    if ($('script#__NEXT_DATA__').length > 0) {
        globals.add('__NEXT_DATA__');
        if (!htmlHints.includes('nextjs_data')) htmlHints.push('nextjs_data');
    }

    const stylesheets: string[] = [];
    $('link[rel="stylesheet"]').each((_, el) => {
        const href = $(el).attr('href');
        if (href) stylesheets.push(href);
    });

    const metas: PageFacts['metas'] = [];
    $('meta').each((_, el) => {
        const name = $(el).attr('name') || $(el).attr('property');
        if (name) metas.push({ name, content: $(el).attr('content') ?? '' });
    });

    const classNames = new Set<string>();
    const dataAttributes = new Set<string>();
    const attributes = new Set<string>();
    $('*').each((_, el) => {
        if (!('attribs' in el)) return;
        splitClasses(el.attribs.class).forEach(c => classNames.add(c));
        for (const name of Object.keys(el.attribs)) {
            if (name.startsWith('data-')) dataAttributes.add(name);
            if (isFrameworkAttribute(name)) attributes.add(name);
        }
    });

    const cssVariables = new Set<string>();
    $('style').each((_, el) => {
        for (const match of $(el).text().matchAll(CSS_VARIABLE_DECLARATION)) {
            cssVariables.add(match[1]);
        }
    });

    for (const [selector, hint] of STRUCTURAL_HINTS) {
        if ($(selector).length > 0) htmlHints.push(hint);
    }

    return {
        scripts,
        stylesheets,
        metas,
        globals: [...globals],
        attributes: [...attributes],
        dataAttributes: [...dataAttributes],
        classNames: [...classNames].slice(0, MAX_CLASS_NAMES),
        inlineStyleCount: $('[style]').length,
        cssVariables: [...cssVariables].slice(0, MAX_CSS_VARIABLES),
        htmlHints,
    };
}

/**
 * Element facts without a layout engine: no bounding boxes, computed styles or
 * scroll metrics, so geometry-based rules see no signal.
 */
export function extractElementFactsFromHtml(html: string, selector: string, cap: number = 50): ElementFacts[] {
    const $ = cheerio.load(html);
    const results: ElementFacts[] = [];

    $(selector).each((_, el) => {
        if (results.length >= cap) return false;
        if (!('attribs' in el)) return undefined;

        const node = $(el);
        const tag = el.tagName.toLowerCase();
        const classes = splitClasses(el.attribs.class);
        const id = el.attribs.id;

        let uniqueSelector = tag;
        if (id) {
            uniqueSelector = '#' + id;
        } else if (classes.length > 0) {
            uniqueSelector = tag + '.' + classes.join('.');
        }

        const text = node.text().trim().substring(0, 100);
        const inlineStyle = el.attribs.style || '';

        results.push({
            tagName: tag,
            selector: uniqueSelector,
            textContent: text || undefined,
            ariaRole: el.attribs.role,
            ariaLabel: el.attribs['aria-label'],
            altText: el.attribs.alt,
            classes,
            elementId: id || undefined,
            childrenCount: node.children().length,
            isVisible: el.attribs.hidden === undefined && !/display\s*:\s*none/.test(inlineStyle),
        });
        return undefined;
    });

    return results;
}

/**
 * Resolves a CLI target to HTML files: the file itself, or every *.html under
 * a folder (node_modules excluded), sorted.
 */
export async function findHtmlFiles(target: string): Promise<string[]> {
    const absPath = path.resolve(target);
    if (!fs.existsSync(absPath)) {
        throw new Error(`No such file or directory: ${target}`);
    }
    if (fs.statSync(absPath).isFile()) {
        return [absPath];
    }

    const files = await glob('**/*.html', { cwd: absPath, absolute: true, ignore: ['**/node_modules/**'] });
    return files.sort();
}

function unique(values: string[]): string[] {
    return [...new Set(values)];
}

/** Unions the facts of several pages of one site. */
export function mergePageFacts(pages: readonly PageFacts[]): PageFacts {
    return {
        scripts: unique(pages.flatMap(p => p.scripts)),
        stylesheets: unique(pages.flatMap(p => p.stylesheets)),
        metas: pages.flatMap(p => p.metas),
        globals: unique(pages.flatMap(p => p.globals)),
        attributes: unique(pages.flatMap(p => p.attributes)),
        dataAttributes: unique(pages.flatMap(p => p.dataAttributes)),
        classNames: unique(pages.flatMap(p => p.classNames)).slice(0, MAX_CLASS_NAMES),
        inlineStyleCount: pages.reduce((sum, p) => sum + p.inlineStyleCount, 0),
        cssVariables: unique(pages.flatMap(p => p.cssVariables)).slice(0, MAX_CSS_VARIABLES),
        htmlHints: unique(pages.flatMap(p => p.htmlHints)),
    };
}

/** Page facts for a local file or folder, merged across every HTML file found. */
export async function readPageFacts(target: string): Promise<PageFacts> {
    const files = await findHtmlFiles(target);
    if (files.length === 0) {
        throw new Error(`No HTML files found in ${target}`);
    }
    return mergePageFacts(files.map(file => extractPageFactsFromHtml(fs.readFileSync(file, 'utf-8'))));
}
