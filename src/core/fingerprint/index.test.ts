import { describe, expect, it } from 'vitest';
import { page } from '../../test-utils/fixtures';
import { fingerprintStack, FRAMEWORK_SIGNATURES, STYLE_SIGNATURES, summarizeStack } from './index';

const TAILWIND_CLASSES = [
    'flex', 'grid', 'hidden', 'block', 'items-center', 'justify-center', 'gap-4', 'rounded-md',
    'bg-white', 'text-sm', 'font-bold', 'px-4', 'py-2', 'shadow-sm', 'hover:bg-gray-100', 'md:flex',
];

describe('signature tables', () => {
    it('load in evaluation order', () => {
        expect(FRAMEWORK_SIGNATURES.map(s => s.name)).toEqual([
            'React', 'Vue.js', 'Angular', 'Svelte', 'Next.js', 'Nuxt', 'Remix', 'Astro', 'Gatsby', 'Vite', 'jQuery',
        ]);
        expect(STYLE_SIGNATURES.map(s => s.name)).toEqual([
            'Tailwind CSS', 'Bootstrap', 'Material UI', 'Chakra UI', 'shadcn/ui', 'Ant Design', 'Bulma', 'Foundation',
        ]);
    });
});

describe('fingerprintStack', () => {
    it('falls back to vanilla for a page with no signals', () => {
        const result = fingerprintStack(page());

        expect(result.primaryFramework).toBe('Vanilla JS/HTML');
        expect(result.metaFramework).toBeNull();
        expect(result.cssApproach).toBe('traditional-css');
        expect(result.hasVanillaJs).toBe(true);
        const raised = Object.entries(result)
            .filter(([key, value]) => /^(has|uses)/.test(key) && value === true)
            .map(([key]) => key);
        expect(raised).toEqual(['hasVanillaJs']);
        expect(result.frameworks).toEqual([{
            name: 'Vanilla JavaScript',
            category: 'js_framework',
            confidence: 'low',
            indicators: ['No major JS framework detected'],
        }]);
        expect(result.summary).toBe('JS Framework: Vanilla JS/HTML | CSS: Traditional CSS');
        expect(result.fixApproach.startsWith('Standard CSS: Edit stylesheets directly.')).toBe(true);
    });

    it('resolves a Next.js + Tailwind + shadcn/ui page', () => {
        const result = fingerprintStack(page({
            globals: ['__NEXT_DATA__'],
            htmlHints: ['nextjs_root'],
            scripts: ['https://shop.test/_next/static/chunks/main.js'],
            classNames: TAILWIND_CLASSES,
            dataAttributes: ['data-state'],
            cssVariables: ['--background', '--foreground', '--primary', '--muted', '--accent', '--ring'],
        }));

        expect(result.hasNextjs).toBe(true);
        expect(result.hasReact).toBe(true);
        expect(result.hasTailwind).toBe(true);
        expect(result.hasShadcn).toBe(true);
        expect(result.hasVanillaJs).toBe(false);
        expect(result.primaryFramework).toBe('Next.js');
        expect(result.metaFramework).toBe('Next.js');
        expect(result.cssApproach).toBe('tailwind');
        expect(result.usesCssVariables).toBe(true);

        // Implied React adds no second entry.
        expect(result.frameworks.map(f => f.name)).toEqual(['Next.js', 'Tailwind CSS', 'shadcn/ui']);
        expect(result.frameworks[0]).toEqual({
            name: 'Next.js',
            category: 'meta_framework',
            confidence: 'high',
            indicators: ['Global __NEXT_DATA__ found', 'Structural hint nextjs_root', 'Script URL contains "_next/"'],
        });
        expect(result.frameworks[1].confidence).toBe('high');
        expect(result.frameworks[2]).toEqual({
            name: 'shadcn/ui',
            category: 'ui_library',
            confidence: 'medium',
            indicators: ['Radix UI primitives + Tailwind detected'],
        });

        expect(result.summary).toBe('Meta Framework: Next.js | CSS: Tailwind CSS | UI Library: shadcn/ui | Uses CSS Variables');
        expect(result.fixApproach.startsWith('Next.js: Use className prop for styling.')).toBe(true);
        expect(result.fixApproach).toContain(' Tailwind: Modify classes directly in JSX/HTML.');
        expect(result.fixApproach).toContain(' shadcn/ui: Components are in /components/ui.');
    });

    it('scores a script-only React match as medium confidence', () => {
        const result = fingerprintStack(page({ scripts: ['https://cdn.test/react.production.min.js'] }));

        expect(result.frameworks).toEqual([{
            name: 'React',
            category: 'js_framework',
            confidence: 'medium',
            indicators: ['Script URL contains "react"'],
        }]);
        expect(result.primaryFramework).toBe('React');
        expect(result.summary).toBe('JS Framework: React | CSS: Traditional CSS');
        expect(result.fixApproach).toBe(
            'React: Styles can be in CSS files, CSS modules (.module.css), ' +
            'styled-components, or inline style objects. Check the component file imports.'
        );
    });

    it('lets Nuxt imply Vue', () => {
        const result = fingerprintStack(page({ globals: ['__NUXT__'] }));

        expect(result.hasNuxt).toBe(true);
        expect(result.hasVue).toBe(true);
        expect(result.frameworks.map(f => f.name)).toEqual(['Nuxt']);
        expect(result.primaryFramework).toBe('Nuxt');
        expect(result.fixApproach.startsWith('Nuxt: Check <style scoped> sections')).toBe(true);
    });

    it('reports jQuery without making it the primary framework', () => {
        const result = fingerprintStack(page({ globals: ['jQuery', '$'] }));

        expect(result.hasJquery).toBe(true);
        expect(result.hasVanillaJs).toBe(false);
        expect(result.primaryFramework).toBe('Vanilla JS/HTML');
        expect(result.frameworks.map(f => f.name)).toEqual(['jQuery']);
        expect(result.frameworks[0].confidence).toBe('high');
    });

    it('detects Angular from its version attribute hint', () => {
        const result = fingerprintStack(page({ htmlHints: ['angular_version'], attributes: ['_ngcontent-abc'] }));

        expect(result.hasAngular).toBe(true);
        expect(result.frameworks[0].confidence).toBe('high');
        expect(result.frameworks[0].indicators).toEqual([
            'Structural hint angular_version',
            'Attribute matching "_ng"',
        ]);
    });

    it('detects Svelte from scoped classes', () => {
        const result = fingerprintStack(page({ classNames: ['svelte-1x2y3z'] }));

        expect(result.hasSvelte).toBe(true);
        expect(result.primaryFramework).toBe('Svelte');
        expect(result.frameworks[0]).toMatchObject({ confidence: 'medium', indicators: ['Classes prefixed "svelte-"'] });
    });

    it('records Vite as a build tool and bundler hint', () => {
        const result = fingerprintStack(page({ globals: ['__vite__'] }));

        expect(result.hasVite).toBe(true);
        expect(result.bundlerHints).toEqual(['Vite']);
        expect(result.frameworks[0]).toMatchObject({ name: 'Vite', category: 'build_tool' });
        expect(result.hasVanillaJs).toBe(true);
    });

    it('detects Bootstrap from its stylesheet even below the class threshold', () => {
        const result = fingerprintStack(page({
            stylesheets: ['https://cdn.test/bootstrap.min.css'],
            classNames: ['container', 'row', 'col-md-6'],
        }));

        expect(result.hasBootstrap).toBe(true);
        expect(result.cssApproach).toBe('bootstrap');
        expect(result.frameworks[0]).toEqual({
            name: 'Bootstrap',
            category: 'css_framework',
            confidence: 'medium',
            indicators: ['Found 3 Bootstrap class patterns', 'Bootstrap asset referenced'],
        });
    });

    it('classifies a Material UI page as a component library', () => {
        const result = fingerprintStack(page({
            classNames: ['MuiButton-root', 'MuiButtonBase-root', 'MuiTypography-root', 'css-1abc2d', 'css-9xyz8w'],
        }));

        expect(result.hasMaterialUi).toBe(true);
        expect(result.cssApproach).toBe('component-library');
        expect(result.usesCssModules).toBe(false);
        expect(result.frameworks[0]).toEqual({
            name: 'Material UI',
            category: 'ui_library',
            confidence: 'high',
            indicators: ['Found 5 Material UI classes'],
        });
        expect(result.summary).toBe('JS Framework: Vanilla JS/HTML | CSS: Component Library CSS | UI Library: Material UI');
    });

    it('detects Chakra UI from its data attribute alone', () => {
        const result = fingerprintStack(page({ dataAttributes: ['data-chakra-component'] }));

        expect(result.hasChakraUi).toBe(true);
        expect(result.frameworks[0].confidence).toBe('high');
    });

    it('requires Tailwind before reporting shadcn/ui', () => {
        const result = fingerprintStack(page({ dataAttributes: ['data-radix-popper-content-wrapper'] }));

        expect(result.hasShadcn).toBe(false);
    });

    it('recognises hashed CSS module classes', () => {
        const result = fingerprintStack(page({ classNames: ['Navbar_root__x1y2z'] }));

        expect(result.cssApproach).toBe('css-modules');
        expect(result.usesCssModules).toBe(true);
    });

    it('switches to inline styles above 20 styled elements', () => {
        expect(fingerprintStack(page({ inlineStyleCount: 20 })).cssApproach).toBe('traditional-css');

        const result = fingerprintStack(page({ inlineStyleCount: 21 }));
        expect(result.cssApproach).toBe('inline-styles');
        expect(result.usesInlineStyles).toBe(true);
    });

    it('sets the supplementary styling flags', () => {
        const result = fingerprintStack(page({
            dataAttributes: ['data-styled', 'data-emotion'],
            stylesheets: ['/assets/site.scss?v=2'],
            scripts: ['/src/main.tsx'],
            cssVariables: ['--a', '--b', '--c', '--d', '--e'],
        }));

        expect(result.usesStyledComponents).toBe(true);
        expect(result.usesEmotion).toBe(true);
        expect(result.usesSass).toBe(true);
        expect(result.hasTypescript).toBe(true);
        expect(result.usesCssVariables).toBe(false);
    });

    it('is deterministic', () => {
        const facts = page({ globals: ['React'], classNames: TAILWIND_CLASSES });
        expect(fingerprintStack(facts)).toEqual(fingerprintStack(facts));
    });
});

describe('summarizeStack', () => {
    it('produces the compact shape', () => {
        const result = fingerprintStack(page({
            globals: ['React'],
            classNames: ['chakra-button', 'chakra-stack'],
        }));

        expect(summarizeStack(result)).toEqual({
            primaryFramework: 'React',
            metaFramework: null,
            cssApproach: 'component-library',
            uiLibrary: 'Chakra UI',
            frameworks: [
                { name: 'React', category: 'js_framework', confidence: 'high' },
                { name: 'Chakra UI', category: 'ui_library', confidence: 'high' },
            ],
            summary: 'JS Framework: React | CSS: Component Library CSS | UI Library: Chakra UI',
            fixApproach: result.fixApproach,
            details: {
                hasTailwind: false,
                hasBootstrap: false,
                usesCssModules: false,
                usesCssVariables: false,
                usesInlineStyles: false,
            },
        });
    });
});
