import { describe, expect, it } from 'vitest';
import { ClassifiedElement, ElementType, Issue } from '../../types';
import { element } from '../../test-utils/fixtures';
import { cssRule, fileHintFor, synthesizeFixes } from './index';

function classified(elementType: ElementType, overrides: Partial<ClassifiedElement> = {}): ClassifiedElement {
    return { ...element(overrides), elementType };
}

function issue(overrides: Partial<Issue> & Pick<Issue, 'kind' | 'selector' | 'elementType'>): Issue {
    return {
        severity: 'warning',
        description: 'test issue',
        suggestedFix: `Fix ${overrides.selector}`,
        ...overrides,
    };
}

describe('synthesizeFixes', () => {
    const elements = [
        classified('navbar', { tagName: 'nav', selector: 'nav' }),
        classified('footer', { tagName: 'footer', selector: 'footer.site-footer', classes: ['Footer_root__a1b2c'] }),
        classified('footer', { tagName: 'footer', selector: 'footer.legal' }),
    ];

    it('emits issue-derived instructions before hint fallbacks with gapless priorities', () => {
        const result = synthesizeFixes('footer padding too tight', elements, [
            issue({ kind: 'spacing_inconsistent', selector: 'footer.site-footer', elementType: 'footer' }),
            issue({ kind: 'z_index_conflict', selector: '#overlay', elementType: 'modal' }),
        ], 'http://localhost:3000/');

        expect(result.interpretedProblem).toBe('User is reporting spacing with the footer');
        expect(result.affectedElements.map(el => el.selector)).toEqual(['footer.site-footer', 'footer.legal']);
        expect(result.fixInstructions.map(fix => fix.priority)).toEqual([1, 2, 3]);

        const [fromIssue, firstFallback, secondFallback] = result.fixInstructions;
        expect(fromIssue).toMatchObject({
            targetDescription: 'Fix spacing_inconsistent on footer',
            selector: 'footer.site-footer',
            fileHint: 'components/Footer',
            action: 'modify_css',
            propertyChanges: { padding: '1rem', margin: '0' },
            explanation: 'Fix footer.site-footer',
        });
        expect(firstFallback).toMatchObject({
            targetDescription: 'Adjust spacing on footer',
            selector: 'footer.site-footer',
            propertyChanges: { padding: '1rem', margin: '0 auto', gap: '1rem' },
            explanation: 'Standardize spacing on the footer element to fix layout issues',
        });
        expect(secondFallback.selector).toBe('footer.legal');
        expect(secondFallback.fileHint).toBeUndefined();

        expect(result.cssChanges).toBe('footer.site-footer {\n    padding: 1rem;\n    margin: 0;\n}');
        expect(result.htmlChanges).toBe('');
        expect(result.summary).toBe('Found 3 fixes to apply. Affects 2 elements');
        expect(result.additionalRecommendations).toEqual([]);
        expect(result.url).toBe('http://localhost:3000/');
        expect(result.userQuery).toBe('footer padding too tight');
    });

    it('takes every issue and the first ten elements when no type is mentioned', () => {
        const many = Array.from({ length: 12 }, (_, i) => classified('other', { selector: `div.item-${i}` }));

        const result = synthesizeFixes('it looks weird', many, [
            issue({ kind: 'accessibility_missing', selector: 'img.hero', elementType: 'image', suggestedFix: 'Add alt text' }),
            issue({ kind: 'empty_container', selector: 'div.blank', elementType: 'container' }),
        ]);

        expect(result.interpretedProblem).toBe('User is reporting unknown issues with the general UI');
        expect(result.affectedElements).toHaveLength(10);
        expect(result.fixInstructions.map(fix => fix.action)).toEqual(['modify_html', 'remove_html']);
        expect(result.fixInstructions.map(fix => fix.propertyChanges)).toEqual([{}, {}]);
        expect(result.cssChanges).toBe('');
        expect(result.htmlChanges).toBe('<!-- img.hero: Add alt text -->\n<!-- remove div.blank -->');
        expect(result.summary).toBe('Found 2 fixes to apply. Affects 10 elements');
        expect(result.additionalRecommendations).toEqual([
            "Consider adding a proper <nav> element with role='navigation' for better accessibility",
            'Consider adding a <footer> element for site information and links',
        ]);
        expect(result.url).toBe('');
    });

    it('prefers the explicit property and value carried by an issue', () => {
        const result = synthesizeFixes('', elements, [
            issue({ kind: 'overflow_hidden', selector: 'div.a', elementType: 'other', cssProperty: 'width', recommendedValue: '100%' }),
            issue({ kind: 'overflow_hidden', selector: 'div.b', elementType: 'other', cssProperty: 'overflow-x', currentValue: 'visible' }),
            issue({ kind: 'contrast_low', selector: 'p.muted', elementType: 'other', codeSnippet: 'p.muted { color: #333; }' }),
        ]);

        expect(result.fixInstructions[0].propertyChanges).toEqual({ width: '100%' });
        expect(result.fixInstructions[1].propertyChanges).toEqual({ 'overflow-x': 'hidden', 'max-width': '100%' });
        expect(result.fixInstructions[2].propertyChanges).toEqual({});
        expect(result.fixInstructions[2].action).toBe('modify_css');
        expect(result.fixInstructions[2].afterCode).toBe('p.muted { color: #333; }');
        expect(result.cssChanges).toBe(
            'div.a {\n    width: 100%;\n}\n\ndiv.b {\n    overflow-x: hidden;\n    max-width: 100%;\n}'
        );
    });

    it('reports no fixes for empty input', () => {
        const result = synthesizeFixes('', [], []);

        expect(result.fixInstructions).toEqual([]);
        expect(result.affectedElements).toEqual([]);
        expect(result.summary).toBe('No specific fixes identified');
        expect(result.additionalRecommendations).toHaveLength(2);
    });

    it('adds layout fallbacks for two elements and responsive advice', () => {
        const plain = [
            classified('other', { selector: 'div.a' }),
            classified('other', { selector: 'div.b' }),
            classified('other', { selector: 'div.c' }),
        ];

        const result = synthesizeFixes('layout broken on mobile', plain, []);

        expect(result.fixInstructions.map(fix => [fix.priority, fix.selector, fix.targetDescription])).toEqual([
            [1, 'div.a', 'Fix layout on other'],
            [2, 'div.b', 'Fix layout on other'],
        ]);
        expect(result.fixInstructions[0].propertyChanges).toEqual({
            display: 'flex', 'flex-direction': 'row', 'flex-wrap': 'wrap', gap: '1rem',
        });
        expect(result.additionalRecommendations.slice(2)).toEqual([
            'Add CSS media queries to handle different screen sizes',
            'Use relative units (rem, %, vw) instead of fixed pixels for better responsiveness',
            'Consider using CSS Grid or Flexbox for complex layouts',
            'Use a consistent spacing system (e.g., 0.5rem, 1rem, 2rem)',
        ]);
    });

    it('is deterministic', () => {
        const issues = [issue({ kind: 'z_index_conflict', selector: '#top', elementType: 'footer' })];
        expect(synthesizeFixes('footer spacing', elements, issues)).toEqual(synthesizeFixes('footer spacing', elements, issues));
    });
});

describe('fileHintFor', () => {
    it('recognises component-style class names', () => {
        expect(fileHintFor(['nav-bar', 'Navbar_root__x1y2z'])).toBe('components/Navbar');
        expect(fileHintFor(['NavBar-module'])).toBe('components/NavBar');
        expect(fileHintFor(['Navbar'])).toBe('components/Navbar');
    });

    it('ignores utility and MUI classes', () => {
        expect(fileHintFor(['navbar', 'flex'])).toBeUndefined();
        expect(fileHintFor(['MuiButton-root'])).toBeUndefined();
    });
});

describe('cssRule', () => {
    it('renders one declaration per line', () => {
        expect(cssRule('.a', { color: 'red', margin: '0' })).toBe('.a {\n    color: red;\n    margin: 0;\n}');
    });
});
