import { z } from 'zod';
import { ELEMENT_TYPES, ElementType } from '../../types';
import catalogueJson from './selectors.json';

export const MAX_COMBINED_SELECTORS = 30;

const CatalogueSchema = z.array(z.object({
    type: z.enum(ELEMENT_TYPES).refine(t => t !== 'other', 'the "other" type has no selectors'),
    selectors: z.array(z.string().min(1)).min(1),
}));

function loadCatalogue(): ReadonlyMap<ElementType, readonly string[]> {
    const entries = CatalogueSchema.parse(catalogueJson);
    const map = new Map<ElementType, readonly string[]>();
    for (const entry of entries) {
        map.set(entry.type, Object.freeze([...entry.selectors]));
    }
    return map;
}

/**
 * ElementType -> CSS selectors used for bulk DOM queries and highlighting.
 * Keep in step with the classifier's keyword table: each type's first selector
 * must classify back to the type itself.
 */
export const ELEMENT_SELECTORS: ReadonlyMap<ElementType, readonly string[]> = loadCatalogue();

export function selectorsFor(type: ElementType): readonly string[] {
    return ELEMENT_SELECTORS.get(type) ?? [];
}

/**
 * Joins the selectors of the given types (all types when omitted) into one
 * comma-separated selector. Duplicates are dropped, first occurrence wins,
 * and at most `limit` selectors are kept.
 */
export function combinedSelector(types?: readonly ElementType[], limit: number = MAX_COMBINED_SELECTORS): string {
    const sources = types && types.length > 0 ? types : [...ELEMENT_SELECTORS.keys()];
    const seen = new Set<string>();
    for (const type of sources) {
        for (const selector of selectorsFor(type)) {
            seen.add(selector);
        }
    }
    return [...seen].slice(0, limit).join(', ');
}

export function describeCatalogue(): string {
    let result = 'Common UI Element Selectors\n';
    result += '='.repeat(40) + '\n\n';

    for (const [type, selectors] of ELEMENT_SELECTORS) {
        result += `${type.toUpperCase()}:\n`;
        for (const selector of selectors) {
            result += `  - ${selector}\n`;
        }
        result += '\n';
    }

    return result;
}
