import {
    ClassifiedElement,
    FixAction,
    FixInstruction,
    FixInstructionsResult,
    Issue,
    IssueHint,
    IssueKind,
    QueryInterpretation,
} from '../../types';
import { interpretQuery } from '../query';

const FALLBACK_AFFECTED = 10;

const ACTION_BY_KIND: Partial<Record<IssueKind, FixAction>> = {
    layout_broken: 'modify_css',
    overflow_hidden: 'modify_css',
    z_index_conflict: 'modify_css',
    spacing_inconsistent: 'modify_css',
    alignment_off: 'modify_css',
    element_overlap: 'modify_css',
    broken_flexbox: 'modify_css',
    broken_grid: 'modify_css',
    contrast_low: 'modify_css',
    accessibility_missing: 'modify_html',
    empty_container: 'remove_html',
};

const PROPERTIES_BY_KIND: Partial<Record<IssueKind, Record<string, string>>> = {
    overflow_hidden: { 'overflow-x': 'hidden', 'max-width': '100%' },
    z_index_conflict: { 'z-index': '10' },
    spacing_inconsistent: { padding: '1rem', margin: '0' },
};

interface HintTemplate {
    hint: IssueHint;
    limit: number;
    properties: Record<string, string>;
    target: (type: string) => string;
    explanation: (type: string) => string;
}

const HINT_TEMPLATES: HintTemplate[] = [
    {
        hint: 'spacing',
        limit: 3,
        properties: { padding: '1rem', margin: '0 auto', gap: '1rem' },
        target: type => `Adjust spacing on ${type}`,
        explanation: type => `Standardize spacing on the ${type} element to fix layout issues`,
    },
    {
        hint: 'alignment',
        limit: 3,
        properties: { display: 'flex', 'align-items': 'center', 'justify-content': 'center' },
        target: type => `Fix alignment on ${type}`,
        explanation: type => `Use flexbox to properly align content within ${type}`,
    },
    {
        hint: 'layout',
        limit: 2,
        properties: { display: 'flex', 'flex-direction': 'row', 'flex-wrap': 'wrap', gap: '1rem' },
        target: type => `Fix layout on ${type}`,
        explanation: type => `Apply proper flexbox layout to ${type}`,
    },
];

// Navbar_root__x1y2z (CSS modules), NavBar-module, Navbar
const COMPONENT_CLASS = /^([A-Z][A-Za-z0-9]+)(?:[_-]|$)/;

/**
 * Guesses the component file that styles an element from its class names.
 * MUI's generated classes (MuiButton-root) look like components but are not ours.
 */
export function fileHintFor(classes: readonly string[]): string | undefined {
    for (const cls of classes) {
        if (cls.startsWith('Mui')) continue;
        const match = cls.match(COMPONENT_CLASS);
        if (match) return `components/${match[1]}`;
    }
    return undefined;
}

export function cssRule(selector: string, properties: Record<string, string>): string {
    let rule = `${selector} {\n`;
    for (const [prop, value] of Object.entries(properties)) {
        rule += `    ${prop}: ${value};\n`;
    }
    return rule + '}';
}

export class Fixer {
    synthesize(
        query: string,
        elements: readonly ClassifiedElement[],
        issues: readonly Issue[],
        url: string = ''
    ): FixInstructionsResult {
        const interpretation = interpretQuery(query);
        const targetTypes = interpretation.elementTypes;

        const affected = targetTypes.length > 0
            ? elements.filter(el => targetTypes.includes(el.elementType))
            : elements.slice(0, FALLBACK_AFFECTED);

        const instructions: FixInstruction[] = [];
        const cssChanges: string[] = [];
        const htmlChanges: string[] = [];

        // Detected issues first, then generic hint fallbacks; priority keeps counting across both.
        for (const issue of issues) {
            if (targetTypes.length > 0 && !targetTypes.includes(issue.elementType)) continue;

            const owner = elements.find(el => el.selector === issue.selector);
            const instruction = this.fromIssue(issue, instructions.length + 1, owner);
            instructions.push(instruction);

            if (Object.keys(instruction.propertyChanges).length > 0) {
                cssChanges.push(cssRule(issue.selector, instruction.propertyChanges));
            }
            if (instruction.action === 'modify_html') {
                htmlChanges.push(`<!-- ${issue.selector}: ${issue.suggestedFix} -->`);
            } else if (instruction.action === 'remove_html') {
                htmlChanges.push(`<!-- remove ${issue.selector} -->`);
            }
        }

        for (const hint of interpretation.issueHints) {
            const template = HINT_TEMPLATES.find(t => t.hint === hint);
            if (!template) continue;

            for (const el of affected.slice(0, template.limit)) {
                instructions.push({
                    priority: instructions.length + 1,
                    targetDescription: template.target(el.elementType),
                    selector: el.selector,
                    fileHint: fileHintFor(el.classes),
                    action: 'modify_css',
                    propertyChanges: { ...template.properties },
                    explanation: template.explanation(el.elementType),
                });
            }
        }

        return {
            url,
            userQuery: query,
            interpretedProblem: interpretation.interpretedMeaning,
            affectedElements: affected,
            fixInstructions: instructions,
            summary: this.summarize(instructions.length, affected.length),
            cssChanges: cssChanges.join('\n\n'),
            htmlChanges: htmlChanges.join('\n'),
            additionalRecommendations: this.recommend(interpretation, elements),
        };
    }

    private fromIssue(issue: Issue, priority: number, owner?: ClassifiedElement): FixInstruction {
        let propertyChanges: Record<string, string> = {};
        if (issue.cssProperty && issue.recommendedValue) {
            propertyChanges[issue.cssProperty] = issue.recommendedValue;
        } else {
            propertyChanges = { ...(PROPERTIES_BY_KIND[issue.kind] ?? {}) };
        }

        return {
            priority,
            targetDescription: `Fix ${issue.kind} on ${issue.elementType}`,
            selector: issue.selector,
            fileHint: owner ? fileHintFor(owner.classes) : undefined,
            action: ACTION_BY_KIND[issue.kind] ?? 'modify_css',
            propertyChanges,
            afterCode: issue.codeSnippet,
            explanation: issue.suggestedFix,
        };
    }

    private summarize(fixCount: number, affectedCount: number): string {
        const parts: string[] = [];
        if (fixCount > 0) parts.push(`Found ${fixCount} fixes to apply`);
        if (affectedCount > 0) parts.push(`Affects ${affectedCount} elements`);
        return parts.length > 0 ? parts.join('. ') : 'No specific fixes identified';
    }

    private recommend(interpretation: QueryInterpretation, elements: readonly ClassifiedElement[]): string[] {
        const recommendations: string[] = [];
        const types = new Set(elements.map(el => el.elementType));

        if (!types.has('navbar')) {
            recommendations.push("Consider adding a proper <nav> element with role='navigation' for better accessibility");
        }
        if (!types.has('footer')) {
            recommendations.push('Consider adding a <footer> element for site information and links');
        }

        const hints = interpretation.issueHints;
        if (hints.includes('responsive')) {
            recommendations.push('Add CSS media queries to handle different screen sizes');
            recommendations.push('Use relative units (rem, %, vw) instead of fixed pixels for better responsiveness');
        }
        if (hints.includes('layout')) {
            recommendations.push('Consider using CSS Grid or Flexbox for complex layouts');
            recommendations.push('Use a consistent spacing system (e.g., 0.5rem, 1rem, 2rem)');
        }

        return recommendations;
    }
}

export function synthesizeFixes(
    query: string,
    elements: readonly ClassifiedElement[],
    issues: readonly Issue[],
    url?: string
): FixInstructionsResult {
    return new Fixer().synthesize(query, elements, issues, url);
}
