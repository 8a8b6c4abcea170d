import { z } from 'zod';
import { CssApproach, FrameworkCategory, FrameworkInfo, PageFacts, StackSummary, TechStackResult } from '../../types';
import signaturesJson from './signatures.json';

type StackFlag = {
    [K in keyof TechStackResult]: TechStackResult[K] extends boolean ? K : never
}[keyof TechStackResult];

const STACK_FLAGS = [
    'hasReact', 'hasVue', 'hasAngular', 'hasSvelte', 'hasNextjs', 'hasNuxt', 'hasRemix', 'hasAstro', 'hasGatsby', 'hasVite',
    'hasTailwind', 'hasBootstrap', 'hasMaterialUi', 'hasChakraUi', 'hasShadcn', 'hasAntDesign', 'hasBulma', 'hasFoundation',
    'hasVanillaJs', 'hasJquery', 'hasTypescript',
    'usesCssModules', 'usesStyledComponents', 'usesEmotion', 'usesSass', 'usesInlineStyles', 'usesCssVariables',
] as const satisfies readonly StackFlag[];

const FRAMEWORK_CATEGORIES = [
    'js_framework', 'css_framework', 'ui_library', 'build_tool', 'meta_framework', 'other',
] as const satisfies readonly FrameworkCategory[];

const FrameworkSignatureSchema = z.object({
    name: z.string().min(1),
    category: z.enum(FRAMEWORK_CATEGORIES),
    flag: z.enum(STACK_FLAGS),
    implies: z.array(z.enum(STACK_FLAGS)).default([]),
    bundlerHint: z.string().optional(),
    globals: z.array(z.string()).default([]),
    hints: z.array(z.string()).default([]),
    scripts: z.array(z.string()).default([]),
    attributes: z.array(z.string()).default([]),
    dataAttributes: z.array(z.string()).default([]),
    classPrefixes: z.array(z.string()).default([]),
});

const StyleSignatureSchema = z.object({
    name: z.string().min(1),
    category: z.enum(FRAMEWORK_CATEGORIES),
    flag: z.enum(STACK_FLAGS),
    // pattern: how many patterns occur in any class; prefix: how many classes start with a pattern
    mode: z.enum(['pattern', 'prefix']),
    patterns: z.array(z.string()),
    threshold: z.number().int().positive().optional(),
    highAt: z.number().int().positive().optional(),
    confidence: z.enum(['high', 'medium']).optional(),
    assets: z.array(z.string()).default([]),
    dataAttributes: z.array(z.string()).default([]),
    requires: z.enum(STACK_FLAGS).optional(),
    indicator: z.string().optional(),
});

const SignaturesSchema = z.object({
    frameworks: z.array(FrameworkSignatureSchema),
    styles: z.array(StyleSignatureSchema),
});

export type FrameworkSignature = z.infer<typeof FrameworkSignatureSchema>;
export type StyleSignature = z.infer<typeof StyleSignatureSchema>;

const SIGNATURES = SignaturesSchema.parse(signaturesJson);

/** Framework signatures in evaluation order. */
export const FRAMEWORK_SIGNATURES: readonly FrameworkSignature[] = SIGNATURES.frameworks;
/** CSS framework and UI library signatures in evaluation order. */
export const STYLE_SIGNATURES: readonly StyleSignature[] = SIGNATURES.styles;

const CSS_VARIABLE_THRESHOLD = 5;
const INLINE_STYLE_THRESHOLD = 20;

// Next.js / webpack CSS modules: Navbar_root__x1y2z
const HASHED_MODULE_CLASS = /^[A-Za-z][A-Za-z0-9-]*_[A-Za-z0-9-]+__[A-Za-z0-9_-]{5,}$/;
const TYPESCRIPT_ASSET = /\.tsx?(\?|$)/;
const SASS_ASSET = /\.s[ac]ss(\?|$)/;

const CSS_APPROACH_LABELS: Record<CssApproach, string> = {
    'tailwind': 'Tailwind CSS',
    'bootstrap': 'Bootstrap',
    'component-library': 'Component Library CSS',
    'css-modules': 'CSS Modules',
    'inline-styles': 'Inline Styles',
    'traditional-css': 'Traditional CSS',
};

const META_FRAMEWORKS: Array<[StackFlag, string]> = [
    ['hasNextjs', 'Next.js'],
    ['hasNuxt', 'Nuxt'],
    ['hasRemix', 'Remix'],
    ['hasGatsby', 'Gatsby'],
    ['hasAstro', 'Astro'],
];

const JS_FRAMEWORKS: Array<[StackFlag, string]> = [
    ['hasReact', 'React'],
    ['hasVue', 'Vue.js'],
    ['hasAngular', 'Angular'],
    ['hasSvelte', 'Svelte'],
];

const UI_LIBRARIES: Array<[StackFlag, string]> = [
    ['hasShadcn', 'shadcn/ui'],
    ['hasMaterialUi', 'Material UI'],
    ['hasChakraUi', 'Chakra UI'],
    ['hasAntDesign', 'Ant Design'],
];

const FRAMEWORK_ADVICE: Array<[StackFlag, string]> = [
    ['hasNextjs',
        'Next.js: Use className prop for styling. Check globals.css for base styles. ' +
        'Component files are typically in /components or /app directories. ' +
        'For Tailwind issues, check tailwind.config.js for theme customization.'],
    ['hasNuxt',
        'Nuxt: Check <style scoped> sections in .vue files. ' +
        'Global styles in assets/css or nuxt.config styles array. ' +
        'Use Nuxt DevTools to inspect component hierarchy.'],
    ['hasReact',
        'React: Styles can be in CSS files, CSS modules (.module.css), ' +
        'styled-components, or inline style objects. Check the component file imports.'],
    ['hasVue',
        'Vue: Check <style> or <style scoped> in .vue files. ' +
        'Scoped styles only affect current component.'],
    ['hasAngular',
        'Angular: Check component.css/scss files alongside component.ts. ' +
        'Use ::ng-deep for child component styling (deprecated but common).'],
    ['hasSvelte',
        'Svelte: Styles are scoped by default in <style> tags. ' +
        'Use :global() for unscoped styles.'],
];

const CSS_FRAMEWORK_ADVICE: Array<[StackFlag, string]> = [
    ['hasTailwind',
        'Tailwind: Modify classes directly in JSX/HTML. ' +
        'For custom values, use arbitrary values like w-[200px] or ' +
        'extend theme in tailwind.config.js. ' +
        'Use @apply in CSS for reusable class combinations.'],
    ['hasBootstrap',
        'Bootstrap: Use Bootstrap utility classes for quick fixes. ' +
        'Override in custom CSS with higher specificity. ' +
        'Check Bootstrap version for available classes.'],
];

const UI_LIBRARY_ADVICE: Array<[StackFlag, string]> = [
    ['hasShadcn',
        'shadcn/ui: Components are in /components/ui. ' +
        'Modify the component source directly or override with className. ' +
        'Theme colors defined in globals.css CSS variables.'],
    ['hasMaterialUi',
        'Material UI: Use sx prop for inline styles or styled() API. ' +
        'Theme customization in ThemeProvider. ' +
        'Use MUI system props like m, p, display.'],
    ['hasChakraUi',
        'Chakra UI: Use style props directly on components. ' +
        'Theme in ChakraProvider. Supports responsive arrays.'],
];

const STANDARD_CSS_ADVICE =
    'Standard CSS: Edit stylesheets directly. ' +
    'Use browser DevTools to identify the exact CSS rules to modify. ' +
    'Check for !important rules that might override changes.';

function emptyResult(): TechStackResult {
    return {
        primaryFramework: 'Vanilla JS/HTML',
        metaFramework: null,
        cssApproach: 'traditional-css',
        frameworks: [],
        hasReact: false, hasVue: false, hasAngular: false, hasSvelte: false, hasNextjs: false,
        hasNuxt: false, hasRemix: false, hasAstro: false, hasGatsby: false, hasVite: false,
        hasTailwind: false, hasBootstrap: false, hasMaterialUi: false, hasChakraUi: false,
        hasShadcn: false, hasAntDesign: false, hasBulma: false, hasFoundation: false,
        hasVanillaJs: false, hasJquery: false, hasTypescript: false,
        usesCssModules: false, usesStyledComponents: false, usesEmotion: false, usesSass: false,
        usesInlineStyles: false, usesCssVariables: false,
        bundlerHints: [],
        summary: '',
        fixApproach: '',
    };
}

function firstFlagged(result: TechStackResult, table: Array<[StackFlag, string]>): string | undefined {
    return table.find(([flag]) => result[flag])?.[1];
}

export class Fingerprinter {
    fingerprint(page: PageFacts): TechStackResult {
        const result = emptyResult();

        for (const signature of FRAMEWORK_SIGNATURES) {
            const info = this.matchFramework(signature, page);
            if (!info) continue;
            result[signature.flag] = true;
            for (const implied of signature.implies) {
                result[implied] = true;
            }
            if (signature.bundlerHint) result.bundlerHints.push(signature.bundlerHint);
            result.frameworks.push(info);
        }

        for (const signature of STYLE_SIGNATURES) {
            if (signature.requires && !result[signature.requires]) continue;
            const info = this.matchStyle(signature, page);
            if (!info) continue;
            result[signature.flag] = true;
            result.frameworks.push(info);
        }

        result.cssApproach = this.resolveCssApproach(result, page);
        this.flagStyling(result, page);

        if (!result.hasReact && !result.hasVue && !result.hasAngular && !result.hasSvelte && !result.hasJquery) {
            result.hasVanillaJs = true;
            result.frameworks.push({
                name: 'Vanilla JavaScript',
                category: 'js_framework',
                confidence: 'low',
                indicators: ['No major JS framework detected'],
            });
        }

        const meta = firstFlagged(result, META_FRAMEWORKS);
        result.metaFramework = meta ?? null;
        result.primaryFramework = meta ?? firstFlagged(result, JS_FRAMEWORKS) ?? 'Vanilla JS/HTML';

        result.summary = this.summarize(result);
        result.fixApproach = this.adviseFix(result);
        return result;
    }

    private matchFramework(signature: FrameworkSignature, page: PageFacts): FrameworkInfo | null {
        const scripts = page.scripts.map(src => src.toLowerCase());

        const globals = signature.globals.filter(name => page.globals.includes(name));
        const hints = signature.hints.filter(hint => page.htmlHints.includes(hint));
        const indicators = [
            ...globals.map(name => `Global ${name} found`),
            ...hints.map(hint => `Structural hint ${hint}`),
            ...signature.scripts
                .filter(pattern => scripts.some(src => src.includes(pattern)))
                .map(pattern => `Script URL contains "${pattern}"`),
            ...signature.attributes
                .filter(pattern => page.attributes.some(attr => attr.includes(pattern)))
                .map(pattern => `Attribute matching "${pattern}"`),
            ...signature.dataAttributes
                .filter(pattern => page.dataAttributes.some(attr => attr.includes(pattern)))
                .map(pattern => `Data attribute matching "${pattern}"`),
            ...signature.classPrefixes
                .filter(prefix => page.classNames.some(cls => cls.startsWith(prefix)))
                .map(prefix => `Classes prefixed "${prefix}"`),
        ];

        if (indicators.length === 0) return null;

        return {
            name: signature.name,
            category: signature.category,
            confidence: globals.length > 0 || hints.length > 0 ? 'high' : 'medium',
            indicators,
        };
    }

    private matchStyle(signature: StyleSignature, page: PageFacts): FrameworkInfo | null {
        const classes = page.classNames;
        const count = signature.mode === 'pattern'
            ? signature.patterns.filter(pattern => classes.some(cls => cls.includes(pattern))).length
            : classes.filter(cls => signature.patterns.some(prefix => cls.startsWith(prefix))).length;

        const assets = [...page.scripts, ...page.stylesheets].map(url => url.toLowerCase());
        const assetMatch = signature.assets.some(pattern => assets.some(url => url.includes(pattern)));
        const dataMatch = signature.dataAttributes.some(pattern => page.dataAttributes.some(attr => attr.includes(pattern)));
        const countMatch = signature.threshold !== undefined && count >= signature.threshold;

        if (!countMatch && !assetMatch && !dataMatch) return null;

        const indicators: string[] = [];
        if (signature.indicator) {
            indicators.push(signature.indicator);
        } else {
            if (count > 0) {
                indicators.push(signature.mode === 'pattern'
                    ? `Found ${count} ${signature.name} class patterns`
                    : `Found ${count} ${signature.name} classes`);
            }
            if (assetMatch) indicators.push(`${signature.name} asset referenced`);
            if (dataMatch) indicators.push(`${signature.name} data attributes found`);
        }

        return {
            name: signature.name,
            category: signature.category,
            confidence: signature.confidence
                ?? (signature.highAt !== undefined && count >= signature.highAt ? 'high' : 'medium'),
            indicators,
        };
    }

    private resolveCssApproach(result: TechStackResult, page: PageFacts): CssApproach {
        if (result.hasTailwind) return 'tailwind';
        if (result.hasBootstrap) return 'bootstrap';
        if (result.hasMaterialUi || result.hasChakraUi || result.hasAntDesign) return 'component-library';

        if (page.classNames.some(cls => cls.includes('css-') || HASHED_MODULE_CLASS.test(cls))) {
            result.usesCssModules = true;
            return 'css-modules';
        }
        if (page.inlineStyleCount > INLINE_STYLE_THRESHOLD) {
            result.usesInlineStyles = true;
            return 'inline-styles';
        }
        return 'traditional-css';
    }

    private flagStyling(result: TechStackResult, page: PageFacts) {
        const assets = [...page.scripts, ...page.stylesheets].map(url => url.toLowerCase());

        result.usesCssVariables = page.cssVariables.length > CSS_VARIABLE_THRESHOLD;
        result.usesStyledComponents = page.dataAttributes.some(attr => attr.includes('data-styled'))
            || page.classNames.some(cls => cls.startsWith('sc-'));
        result.usesEmotion = page.dataAttributes.some(attr => attr.includes('data-emotion'));
        result.usesSass = assets.some(url => SASS_ASSET.test(url));
        result.hasTypescript = page.scripts.some(src => TYPESCRIPT_ASSET.test(src.toLowerCase()));
    }

    private summarize(result: TechStackResult): string {
        const parts: string[] = [];

        if (result.metaFramework) {
            parts.push(`Meta Framework: ${result.metaFramework}`);
        } else {
            parts.push(`JS Framework: ${result.primaryFramework}`);
        }

        parts.push(`CSS: ${CSS_APPROACH_LABELS[result.cssApproach]}`);

        const uiLibs = UI_LIBRARIES.filter(([flag]) => result[flag]).map(([, name]) => name);
        if (uiLibs.length > 0) parts.push(`UI Library: ${uiLibs.join(', ')}`);

        if (result.usesCssVariables) parts.push('Uses CSS Variables');

        return parts.join(' | ');
    }

    private adviseFix(result: TechStackResult): string {
        const approaches = [
            firstFlagged(result, FRAMEWORK_ADVICE),
            firstFlagged(result, CSS_FRAMEWORK_ADVICE),
            firstFlagged(result, UI_LIBRARY_ADVICE),
        ].filter((text): text is string => text !== undefined);

        return approaches.length > 0 ? approaches.join(' ') : STANDARD_CSS_ADVICE;
    }
}

export function fingerprintStack(page: PageFacts): TechStackResult {
    return new Fingerprinter().fingerprint(page);
}

export function summarizeStack(result: TechStackResult): StackSummary {
    return {
        primaryFramework: result.primaryFramework,
        metaFramework: result.metaFramework,
        cssApproach: result.cssApproach,
        uiLibrary: result.frameworks.find(f => f.category === 'ui_library')?.name ?? null,
        frameworks: result.frameworks.map(({ name, category, confidence }) => ({ name, category, confidence })),
        summary: result.summary,
        fixApproach: result.fixApproach,
        details: {
            hasTailwind: result.hasTailwind,
            hasBootstrap: result.hasBootstrap,
            usesCssModules: result.usesCssModules,
            usesCssVariables: result.usesCssVariables,
            usesInlineStyles: result.usesInlineStyles,
        },
    };
}
