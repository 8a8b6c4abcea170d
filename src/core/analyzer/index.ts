import {
    ClassifiedElement,
    ElementType,
    FixInstructionsResult,
    PageDriver,
    PageFacts,
    Snapshot,
    StackSummary,
    TechStackResult,
    UIAnalysisResult,
    Viewport,
    ViewportReport,
    ViewportSpec,
} from '../../types';
import { combinedSelector, selectorsFor } from '../catalogue';
import { classifyAll } from '../classifier';
import { detectIssues } from '../detector';
import { fingerprintStack, summarizeStack } from '../fingerprint';
import { synthesizeFixes } from '../fixer';
import { interpretQuery } from '../query';

const AUDIT_SELECTOR = 'body *';
export const MAX_AUDIT_ELEMENTS = 1500;
const DOM_OUTLINE_DEPTH = 5;

export const DEFAULT_VIEWPORT: Viewport = { width: 1920, height: 1080 };

export const DEFAULT_VIEWPORTS: readonly ViewportSpec[] = [
    { name: 'mobile', width: 375, height: 667 },
    { name: 'tablet', width: 768, height: 1024 },
    { name: 'desktop', width: 1920, height: 1080 },
];

export interface AnalyzerOptions {
    viewport?: Viewport;
    /** Cap on catalogue elements extracted per page. */
    maxElements?: number;
    checkContrast?: boolean;
}

export interface AnalyzeOptions {
    query?: string;
    viewport?: Viewport;
    includeScreenshot?: boolean;
}

export interface ScreenshotRequest {
    viewport?: Viewport;
    /** Highlight every element of this type. Ignored when `selector` is set. */
    elementType?: ElementType;
    selector?: string;
    fullPage?: boolean;
}

export interface TechStackReport {
    url: string;
    stack: TechStackResult;
    summary: StackSummary;
}

export function emptyPageFacts(): PageFacts {
    return {
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
}

function errorMessage(e: unknown): string {
    return e instanceof Error ? e.message : String(e);
}

/**
 * Fix instructions from a saved snapshot, without a browser. Every snapshot
 * element is classified; those left as `other` are not candidates.
 */
export function fixSnapshot(snapshot: Snapshot, complaint: string, checkContrast: boolean = false): FixInstructionsResult {
    const elements = classifyAll(snapshot.elements).filter(el => el.elementType !== 'other');
    const issues = detectIssues(snapshot, { checkContrast });
    return synthesizeFixes(complaint, elements, issues, snapshot.url);
}

/**
 * Runs the heuristic pipeline against pages served by a `PageDriver`.
 * Each operation opens its own page and always closes it.
 */
export class Analyzer<TPage> {
    private driver: PageDriver<TPage>;
    private viewport: Viewport;
    private maxElements: number;
    private checkContrast: boolean;

    constructor(driver: PageDriver<TPage>, options: AnalyzerOptions = {}) {
        this.driver = driver;
        this.viewport = options.viewport ?? DEFAULT_VIEWPORT;
        this.maxElements = options.maxElements ?? 50;
        this.checkContrast = options.checkContrast ?? false;
    }

    async analyzePage(url: string, options: AnalyzeOptions = {}): Promise<UIAnalysisResult> {
        const viewport = options.viewport ?? this.viewport;
        const interpretation = options.query ? interpretQuery(options.query) : null;

        return this.withPage(url, viewport, async page => {
            const title = await this.driver.getTitle(page);
            const elements = await this.catalogueElements(page, interpretation?.elementTypes ?? []);

            const audit = await this.driver.extractElementFacts(page, AUDIT_SELECTOR, MAX_AUDIT_ELEMENTS);
            const issues = detectIssues(
                { url, title, viewport, elements: audit, page: emptyPageFacts() },
                { checkContrast: this.checkContrast }
            );

            const accessibilityTree = await this.facet('accessibility tree', '', () =>
                this.driver.extractAccessibilityTree(page));
            const domStructure = await this.facet('DOM outline', '', () =>
                this.driver.extractDomOutline(page, DOM_OUTLINE_DEPTH));

            let screenshotBase64: string | null = null;
            if (options.includeScreenshot ?? true) {
                screenshotBase64 = await this.facet<string | null>('screenshot', null, async () =>
                    (await this.driver.captureScreenshot(page, { fullPage: true })).toString('base64'));
            }

            const elementsSummary: Record<string, number> = {};
            for (const el of elements) {
                elementsSummary[el.elementType] = (elementsSummary[el.elementType] ?? 0) + 1;
            }

            return {
                url,
                pageTitle: title,
                viewportWidth: viewport.width,
                viewportHeight: viewport.height,
                elementsSummary,
                elements,
                issues,
                accessibilityTree,
                domStructure,
                screenshotBase64,
                analysisNotes: interpretation ? [interpretation.interpretedMeaning] : [],
            };
        });
    }

    async getFixInstructions(url: string, complaint: string, viewport: Viewport = this.viewport): Promise<FixInstructionsResult> {
        const interpretation = interpretQuery(complaint);

        return this.withPage(url, viewport, async page => {
            const title = await this.driver.getTitle(page);
            const elements = await this.catalogueElements(page, interpretation.elementTypes);
            const audit = await this.driver.extractElementFacts(page, AUDIT_SELECTOR, MAX_AUDIT_ELEMENTS);
            const issues = detectIssues(
                { url, title, viewport, elements: audit, page: emptyPageFacts() },
                { checkContrast: this.checkContrast }
            );
            return synthesizeFixes(complaint, elements, issues, url);
        });
    }

    async getElementDetails(url: string, type: ElementType, viewport: Viewport = this.viewport): Promise<ClassifiedElement[]> {
        return this.withPage(url, viewport, page => this.catalogueElements(page, [type]));
    }

    /** Everything the offline pipeline needs, in a form that can be written to disk. */
    async captureSnapshot(url: string, viewport: Viewport = this.viewport): Promise<Snapshot> {
        return this.withPage(url, viewport, async page => {
            const title = await this.driver.getTitle(page);
            const elements = await this.driver.extractElementFacts(page, AUDIT_SELECTOR, MAX_AUDIT_ELEMENTS);
            const facts = await this.facet('page facts', emptyPageFacts(), () => this.driver.extractPageFacts(page));
            return { url, title, viewport, elements, page: facts };
        });
    }

    async compareViewports(url: string, viewports: readonly ViewportSpec[] = DEFAULT_VIEWPORTS): Promise<Record<string, ViewportReport>> {
        const reports: Record<string, ViewportReport> = {};

        // One page at a time; the driver shares a single browser.
        for (const spec of viewports) {
            const viewport = { width: spec.width, height: spec.height };
            reports[spec.name] = await this.withPage(url, viewport, async page => {
                const screenshot = await this.driver.captureScreenshot(page, { fullPage: false });
                const elements = await this.catalogueElements(page, []);
                return {
                    width: spec.width,
                    height: spec.height,
                    visibleElements: elements.filter(el => el.isVisible).length,
                    totalElements: elements.length,
                    screenshotBase64: screenshot.toString('base64'),
                };
            });
        }

        return reports;
    }

    async getTechStack(url: string, viewport: Viewport = this.viewport): Promise<TechStackReport> {
        return this.withPage(url, viewport, async page => {
            const facts = await this.facet('page facts', emptyPageFacts(), () => this.driver.extractPageFacts(page));
            const stack = fingerprintStack(facts);
            return { url, stack, summary: summarizeStack(stack) };
        });
    }

    async getScreenshot(url: string, request: ScreenshotRequest = {}): Promise<Buffer> {
        let highlightSelector = request.selector;
        if (!highlightSelector && request.elementType) {
            highlightSelector = selectorsFor(request.elementType).join(', ') || undefined;
        }

        return this.withPage(url, request.viewport ?? this.viewport, page =>
            this.driver.captureScreenshot(page, { fullPage: request.fullPage ?? true, highlightSelector }));
    }

    async getAccessibilitySnapshot(url: string, viewport: Viewport = this.viewport): Promise<string> {
        return this.withPage(url, viewport, page => this.driver.extractAccessibilityTree(page));
    }

    async getDomOverview(url: string, maxDepth: number = DOM_OUTLINE_DEPTH, viewport: Viewport = this.viewport): Promise<string> {
        return this.withPage(url, viewport, page => this.driver.extractDomOutline(page, maxDepth));
    }

    private async catalogueElements(page: TPage, types: readonly ElementType[]): Promise<ClassifiedElement[]> {
        const facts = await this.driver.extractElementFacts(page, combinedSelector(types), this.maxElements);
        return classifyAll(facts);
    }

    private async withPage<T>(url: string, viewport: Viewport, work: (page: TPage) => Promise<T>): Promise<T> {
        const page = await this.driver.loadPage(url, viewport);
        try {
            return await work(page);
        } finally {
            await this.driver.closePage(page);
        }
    }

    private async facet<T>(label: string, fallback: T, extract: () => Promise<T>): Promise<T> {
        try {
            return await extract();
        } catch (e) {
            console.warn(`Could not extract ${label}: ${errorMessage(e)}`);
            return fallback;
        }
    }
}
