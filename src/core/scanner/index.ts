import puppeteer, { Browser, Page } from 'puppeteer-core';
import { z } from 'zod';
import { ElementFacts, PageDriver, PageFacts, ScreenshotOptions, Viewport } from '../../types';
import { ElementFactsSchema, PageFactsSchema } from '../../types/schema';
import { renderAccessibilityTree } from './a11y';

const SETTLE_MS = 500;

export interface ScannerOptions {
    /** Path to a local Chrome or Chromium binary. */
    executablePath?: string;
    headless?: boolean;
}

export class Scanner implements PageDriver<Page> {
    private browser: Browser | null = null;
    private options: ScannerOptions;

    constructor(options: ScannerOptions = {}) {
        this.options = options;
    }

    async init(): Promise<Browser> {
        if (this.browser) return this.browser;

        const executablePath = this.options.executablePath;
        if (!executablePath) {
            throw new Error('No browser configured: set CHROME_PATH or run `ui-lens config set chromePath <path>`');
        }

        this.browser = await puppeteer.launch({
            executablePath,
            headless: this.options.headless ?? true,
            args: ['--no-sandbox', '--disable-setuid-sandbox'],
        });
        return this.browser;
    }

    async close() {
        if (this.browser) {
            await this.browser.close();
            this.browser = null;
        }
    }

    async loadPage(url: string, viewport: Viewport): Promise<Page> {
        const browser = await this.init();
        const page = await browser.newPage();

        try {
            await page.setViewport({ width: viewport.width, height: viewport.height, deviceScaleFactor: 1 });
            await this.navigate(page, url);
        } catch (e) {
            await page.close();
            throw e;
        }

        // Let entry animations finish
        await new Promise(resolve => setTimeout(resolve, SETTLE_MS));
        return page;
    }

    private async navigate(page: Page, url: string) {
        try {
            await page.goto(url, { waitUntil: 'networkidle0' });
        } catch (e) {
            // Pages with long-polling or analytics beacons never go idle.
            console.warn(`Network did not settle for ${url}, retrying on DOMContentLoaded:`, e instanceof Error ? e.message : e);
            await page.goto(url, { waitUntil: 'domcontentloaded' });
        }
    }

    async getTitle(page: Page): Promise<string> {
        return page.title();
    }

    async closePage(page: Page) {
        if (!page.isClosed()) {
            await page.close();
        }
    }

    async extractElementFacts(page: Page, selector: string, cap: number): Promise<ElementFacts[]> {
        const raw = await page.evaluate((sel: string, max: number) => {
            function getXPath(element: Element): string {
                if (element.id) return `//*[@id="${element.id}"]`;
                if (element === document.body) return '/html/body';

                const parent = element.parentElement;
                if (!parent) return '/' + element.tagName.toLowerCase();

                let ix = 0;
                for (const sibling of Array.from(parent.children)) {
                    if (sibling === element) {
                        return `${getXPath(parent)}/${element.tagName.toLowerCase()}[${ix + 1}]`;
                    }
                    if (sibling.tagName === element.tagName) ix++;
                }
                return '';
            }

            const results: ElementFacts[] = [];
            for (const el of Array.from(document.querySelectorAll(sel))) {
                if (results.length >= max) break;

                const rect = el.getBoundingClientRect();
                if (rect.width === 0 && rect.height === 0) continue;

                const style = getComputedStyle(el);
                const tag = el.tagName.toLowerCase();

                let uniqueSelector = tag;
                if (el.id) {
                    uniqueSelector = '#' + el.id;
                } else if (el.classList.length > 0) {
                    uniqueSelector = tag + '.' + Array.from(el.classList).join('.');
                }

                const text = (el.textContent || '').trim().substring(0, 100);

                results.push({
                    tagName: tag,
                    selector: uniqueSelector,
                    xpath: getXPath(el),
                    textContent: text || undefined,
                    boundingBox: { x: rect.x, y: rect.y, width: rect.width, height: rect.height },
                    ariaRole: el.getAttribute('role') ?? undefined,
                    ariaLabel: el.getAttribute('aria-label') ?? undefined,
                    altText: el.getAttribute('alt') ?? undefined,
                    classes: Array.from(el.classList),
                    elementId: el.id || undefined,
                    computedStyles: {
                        backgroundColor: style.backgroundColor,
                        color: style.color,
                        fontSize: style.fontSize,
                        fontFamily: style.fontFamily,
                        padding: style.padding,
                        margin: style.margin,
                        border: style.border,
                        display: style.display,
                        position: style.position,
                        zIndex: style.zIndex,
                        flexDirection: style.flexDirection,
                        justifyContent: style.justifyContent,
                        alignItems: style.alignItems,
                        gap: style.gap,
                        width: style.width,
                        height: style.height,
                        overflowX: style.overflowX,
                    },
                    scroll: { scrollWidth: el.scrollWidth, clientWidth: el.clientWidth },
                    childrenCount: el.children.length,
                    isVisible: style.display !== 'none' && style.visibility !== 'hidden' && style.opacity !== '0',
                });
            }
            return results;
        }, selector, cap);

        return z.array(ElementFactsSchema).parse(raw);
    }

    async extractPageFacts(page: Page): Promise<PageFacts> {
        const raw = await page.evaluate(() => {
            const facts: PageFacts = {
                scripts: [],
                stylesheets: [],
                metas: [],
                globals: [],
                attributes: [],
                dataAttributes: [],
                classNames: [],
                inlineStyleCount: 0,
                cssVariables: [],
                htmlHints: [],
            };

            document.querySelectorAll<HTMLScriptElement>('script[src]').forEach(s => facts.scripts.push(s.src));

            document.querySelectorAll('script:not([src])').forEach(s => {
                const content = s.textContent || '';
                if (content.includes('__NEXT_DATA__')) facts.htmlHints.push('nextjs_data');
                if (content.includes('__NUXT__')) facts.htmlHints.push('nuxt_data');
                if (content.includes('__GATSBY')) facts.htmlHints.push('gatsby_data');
                if (content.includes('__remixContext')) facts.htmlHints.push('remix_data');
            });

            document.querySelectorAll<HTMLLinkElement>('link[rel="stylesheet"]').forEach(l => facts.stylesheets.push(l.href));

            document.querySelectorAll<HTMLMetaElement>('meta').forEach(m => {
                const name = m.name || m.getAttribute('property');
                if (name) facts.metas.push({ name, content: m.content });
            });

            const globalsToCheck = [
                'React', 'ReactDOM', '__REACT_DEVTOOLS_GLOBAL_HOOK__',
                'Vue', '__VUE__', '__VUE_DEVTOOLS_GLOBAL_HOOK__',
                'ng', 'Zone', 'getAllAngularRootElements',
                '__NEXT_DATA__', '__NEXT_LOADED_PAGES__', 'next',
                '__NUXT__', '$nuxt',
                '__remixContext', '__remixManifest',
                '___gatsby', '___loader',
                '__vite__',
                'jQuery', '$',
                'Alpine', 'htmx', 'Stimulus',
                'Svelte',
            ];
            for (const name of globalsToCheck) {
                if (name in window && Reflect.get(window, name) !== undefined) {
                    facts.globals.push(name);
                }
            }

            const classes = new Set<string>();
            const dataAttrs = new Set<string>();
            const frameworkAttrs = new Set<string>();
            document.querySelectorAll('*').forEach(el => {
                el.classList.forEach(c => classes.add(c));
                for (const attr of Array.from(el.attributes)) {
                    if (attr.name.startsWith('data-')) dataAttrs.add(attr.name);
                    if (attr.name.startsWith('ng-') ||
                        attr.name.startsWith('v-') ||
                        attr.name.startsWith('_ng') ||
                        attr.name.includes('react') ||
                        attr.name.includes('svelte')) {
                        frameworkAttrs.add(attr.name);
                    }
                }
            });
            facts.classNames = Array.from(classes).slice(0, 500);
            facts.dataAttributes = Array.from(dataAttrs);
            facts.attributes = Array.from(frameworkAttrs);

            facts.inlineStyleCount = document.querySelectorAll('[style]').length;

            const rootStyles = getComputedStyle(document.documentElement);
            const customProps: string[] = [];
            for (let i = 0; i < rootStyles.length; i++) {
                if (rootStyles[i].startsWith('--')) customProps.push(rootStyles[i]);
            }
            facts.cssVariables = customProps.slice(0, 50);

            if (document.querySelector('[data-reactroot]')) facts.htmlHints.push('react_root');
            if (document.querySelector('#__next')) facts.htmlHints.push('nextjs_root');
            if (document.querySelector('#__nuxt')) facts.htmlHints.push('nuxt_root');
            if (document.querySelector('[ng-version]')) facts.htmlHints.push('angular_version');
            if (document.querySelector('astro-island')) facts.htmlHints.push('astro_island');

            return facts;
        });

        return PageFactsSchema.parse(raw);
    }

    async captureScreenshot(page: Page, options: ScreenshotOptions): Promise<Buffer> {
        const selector = options.highlightSelector;
        if (selector) {
            await page.evaluate((sel: string) => {
                document.querySelectorAll<HTMLElement>(sel).forEach(el => {
                    el.style.outline = '3px solid #ff0000';
                    el.style.outlineOffset = '2px';
                    el.style.boxShadow = '0 0 10px rgba(255,0,0,0.5)';
                });
            }, selector);
        }

        try {
            return await page.screenshot({ fullPage: options.fullPage, type: 'png' });
        } finally {
            if (selector) {
                await page.evaluate((sel: string) => {
                    document.querySelectorAll<HTMLElement>(sel).forEach(el => {
                        el.style.outline = '';
                        el.style.outlineOffset = '';
                        el.style.boxShadow = '';
                    });
                }, selector);
            }
        }
    }

    async extractAccessibilityTree(page: Page): Promise<string> {
        const snapshot = await page.accessibility.snapshot();
        return renderAccessibilityTree(snapshot);
    }

    async extractDomOutline(page: Page, maxDepth: number): Promise<string> {
        return page.evaluate((depthLimit: number) => {
            const significantTags = ['header', 'nav', 'main', 'section', 'article', 'aside', 'footer', 'div', 'form'];

            function outline(element: Element, depth: number): string {
                if (depth > depthLimit) return '';

                const tag = element.tagName.toLowerCase();
                const id = element.id ? '#' + element.id : '';
                const classes = element.classList.length > 0
                    ? '.' + Array.from(element.classList).slice(0, 3).join('.')
                    : '';
                const roleAttr = element.getAttribute('role');
                const role = roleAttr ? `[role="${roleAttr}"]` : '';

                let result = `${'  '.repeat(depth)}${tag}${id}${classes}${role}\n`;
                for (const child of Array.from(element.children)) {
                    if (significantTags.includes(child.tagName.toLowerCase()) || child.id || child.classList.length > 0) {
                        result += outline(child, depth + 1);
                    }
                }
                return result;
            }

            return outline(document.body, 0);
        }, maxDepth);
    }
}
