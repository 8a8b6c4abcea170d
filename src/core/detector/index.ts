import { hex } from 'wcag-contrast';
import { ElementFacts, ElementType, Issue, IssueKind, Severity, Snapshot } from '../../types';
import { classify } from '../classifier';

export const MAX_ISSUES = 20;

const CONTAINER_TAGS = ['div', 'section', 'main', 'article'];
const MIN_EMPTY_CONTAINER_HEIGHT = 50;
const MAX_SANE_Z_INDEX = 9999;
const MIN_CONTRAST_RATIO = 4.5;

const SEVERITY_BY_KIND: Partial<Record<IssueKind, Severity>> = {
    accessibility_missing: 'error',
    overflow_hidden: 'warning',
    z_index_conflict: 'warning',
    contrast_low: 'warning',
    empty_container: 'info',
};

export interface DetectorOptions {
    /** Upper bound on returned issues; values above 20 are clamped. */
    maxIssues?: number;
    checkContrast?: boolean;
}

/**
 * Human-readable remedy for one issue, phrased against the element's selector.
 */
export function suggestFix(kind: IssueKind, selector: string): string {
    switch (kind) {
        case 'overflow_hidden':
            return `Add 'overflow-x: hidden' to the parent container or 'max-width: 100%' to ${selector}`;
        case 'z_index_conflict':
            return `Reduce z-index on ${selector} to a reasonable value (10-100 for most UI elements)`;
        case 'empty_container':
            return `Remove the empty ${selector} element or add content to it`;
        case 'accessibility_missing':
            return `Add appropriate alt text or aria-label to ${selector}`;
        case 'element_overlap':
            return `Adjust position or z-index of ${selector} to prevent overlap`;
        case 'spacing_inconsistent':
            return `Standardize padding/margin values on ${selector}`;
        case 'contrast_low':
            return `Darken the text or lighten the background of ${selector} to reach a 4.5:1 contrast ratio`;
        default:
            return `Review and fix the ${kind} issue on ${selector}`;
    }
}

export class Detector {
    private maxIssues: number;
    private checkContrast: boolean;

    constructor(options: DetectorOptions = {}) {
        this.maxIssues = Math.max(0, Math.min(options.maxIssues ?? MAX_ISSUES, MAX_ISSUES));
        this.checkContrast = options.checkContrast ?? false;
    }

    detect(snapshot: Snapshot): Issue[] {
        const issues: Issue[] = [];
        const elements = snapshot.elements;

        // Pass 1: geometry and stacking
        for (const el of elements) {
            this.checkOverflow(el, snapshot.viewport.width, issues);
            this.checkStacking(el, issues);
        }

        // Pass 2: empty containers
        elements.forEach(el => this.checkEmptyContainer(el, issues));

        // Pass 3: accessible names
        elements.forEach(el => this.checkImageAlt(el, issues));
        elements.forEach(el => this.checkInteractiveName(el, issues));

        if (this.checkContrast) {
            elements.forEach(el => this.checkColorContrast(el, issues));
        }

        return issues.slice(0, this.maxIssues);
    }

    private checkOverflow(el: ElementFacts, viewportWidth: number, issues: Issue[]) {
        const box = el.boundingBox;
        const scroll = el.scroll;
        if (!box || !scroll) return;

        const style = el.computedStyles;
        if (box.x + box.width <= viewportWidth) return;
        if (style?.position === 'fixed') return;

        if (scroll.scrollWidth > scroll.clientWidth && style?.overflowX === 'visible') {
            issues.push(this.createIssue('overflow_hidden', el, classify(el),
                'Element extends beyond viewport causing horizontal scroll',
                { cssProperty: 'overflow-x', currentValue: 'visible' }));
        }
    }

    private checkStacking(el: ElementFacts, issues: Issue[]) {
        const zIndex = Number.parseInt(el.computedStyles?.zIndex ?? '', 10);
        if (zIndex > MAX_SANE_Z_INDEX) {
            issues.push(this.createIssue('z_index_conflict', el, classify(el),
                `Element has extremely high z-index (${zIndex}) which may cause stacking issues`,
                { cssProperty: 'z-index', currentValue: zIndex.toString() }));
        }
    }

    private checkEmptyContainer(el: ElementFacts, issues: Issue[]) {
        if (!CONTAINER_TAGS.includes(el.tagName.toLowerCase())) return;
        if (el.childrenCount !== 0 || (el.textContent ?? '').trim() !== '') return;

        // Zero-height spacers are intentional.
        if (el.boundingBox && el.boundingBox.height > MIN_EMPTY_CONTAINER_HEIGHT) {
            issues.push(this.createIssue('empty_container', el, 'container', 'Empty container taking up space'));
        }
    }

    private checkImageAlt(el: ElementFacts, issues: Issue[]) {
        if (el.tagName.toLowerCase() !== 'img') return;
        if (!el.altText && !el.ariaLabel) {
            issues.push(this.createIssue('accessibility_missing', el, 'image', 'Image missing alt text'));
        }
    }

    private checkInteractiveName(el: ElementFacts, issues: Issue[]) {
        const tag = el.tagName.toLowerCase();
        if (tag !== 'button' && tag !== 'a') return;
        if (!(el.textContent ?? '').trim() && !el.ariaLabel) {
            issues.push(this.createIssue('accessibility_missing', el, tag === 'button' ? 'button' : 'link',
                'Interactive element missing accessible name'));
        }
    }

    private checkColorContrast(el: ElementFacts, issues: Issue[]) {
        if (!(el.textContent ?? '').trim() || !el.computedStyles) return;

        const fg = this.parseColor(el.computedStyles.color);
        const bg = this.parseColor(el.computedStyles.backgroundColor);
        if (!fg || !bg) return;

        const ratio = hex(fg, bg);
        if (ratio < MIN_CONTRAST_RATIO) {
            issues.push(this.createIssue('contrast_low', el, classify(el),
                `Low color contrast: ${ratio.toFixed(2)}:1 (${fg} on ${bg})`,
                { cssProperty: 'color', currentValue: fg }));
        }
    }

    private createIssue(
        kind: IssueKind,
        el: ElementFacts,
        elementType: ElementType,
        description: string,
        extra: Pick<Issue, 'cssProperty' | 'currentValue' | 'recommendedValue' | 'codeSnippet'> = {}
    ): Issue {
        return {
            severity: SEVERITY_BY_KIND[kind] ?? 'warning',
            selector: el.selector,
            elementType,
            kind,
            description,
            suggestedFix: suggestFix(kind, el.selector),
            ...extra,
        };
    }

    private parseColor(colorStr: string | undefined): string | null {
        if (!colorStr) return null;

        // Hex
        if (colorStr.startsWith('#')) {
            if (colorStr.length === 4) {
                return '#' + colorStr[1] + colorStr[1] + colorStr[2] + colorStr[2] + colorStr[3] + colorStr[3];
            }
            return colorStr.length === 7 ? colorStr : null;
        }

        // RGB
        const rgbMatch = colorStr.match(/^rgb\((\d+),\s*(\d+),\s*(\d+)\)$/);
        if (rgbMatch) {
            return this.rgbToHex(parseInt(rgbMatch[1]), parseInt(rgbMatch[2]), parseInt(rgbMatch[3]));
        }

        // RGBA; translucent colours would need blending against whatever is behind them
        const rgbaMatch = colorStr.match(/^rgba\((\d+),\s*(\d+),\s*(\d+),\s*([\d.]+)\)$/);
        if (rgbaMatch) {
            if (parseFloat(rgbaMatch[4]) === 1) {
                return this.rgbToHex(parseInt(rgbaMatch[1]), parseInt(rgbaMatch[2]), parseInt(rgbaMatch[3]));
            }
            return null;
        }

        const namedColors: Record<string, string> = {
            red: '#ff0000', green: '#008000', blue: '#0000ff', white: '#ffffff', black: '#000000',
            gray: '#808080', grey: '#808080', yellow: '#ffff00', purple: '#800080', orange: '#ffa500'
        };
        return namedColors[colorStr.toLowerCase()] ?? null;
    }

    private rgbToHex(r: number, g: number, b: number): string {
        return '#' + ((1 << 24) + (r << 16) + (g << 8) + b).toString(16).slice(1);
    }
}

export function detectIssues(snapshot: Snapshot, options?: DetectorOptions): Issue[] {
    return new Detector(options).detect(snapshot);
}
