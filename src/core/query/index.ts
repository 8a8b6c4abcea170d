import { z } from 'zod';
import { ELEMENT_TYPES, ElementType, ISSUE_HINTS, IssueHint, QueryInterpretation } from '../../types';
import keywordsJson from './keywords.json';

const KeywordTablesSchema = z.object({
    elementKeywords: z.array(z.object({
        type: z.enum(ELEMENT_TYPES),
        keywords: z.array(z.string().min(1)).min(1),
    })),
    issueKeywords: z.array(z.object({
        hint: z.enum(ISSUE_HINTS),
        keywords: z.array(z.string().min(1)).min(1),
    })),
});

const TABLES = KeywordTablesSchema.parse(keywordsJson);

function collect<T>(query: string, table: ReadonlyArray<{ key: T; keywords: readonly string[] }>): T[] {
    const found: T[] = [];
    for (const { key, keywords } of table) {
        if (found.includes(key)) continue;
        if (keywords.some(keyword => query.includes(keyword))) {
            found.push(key);
        }
    }
    return found;
}

const ELEMENT_TABLE = TABLES.elementKeywords.map(entry => ({ key: entry.type, keywords: entry.keywords }));
const HINT_TABLE = TABLES.issueKeywords.map(entry => ({ key: entry.hint, keywords: entry.keywords }));

/**
 * Reads a vague complaint ("the navbar is broken on mobile") as the element
 * types it mentions and the kinds of problem it hints at. Every matching
 * keyword contributes; a later, more specific match never removes an earlier one.
 */
export function interpretQuery(query: string): QueryInterpretation {
    const lower = (query || '').toLowerCase();

    const elementTypes: ElementType[] = collect(lower, ELEMENT_TABLE);
    const issueHints: IssueHint[] = collect(lower, HINT_TABLE);

    const elementsStr = elementTypes.length > 0 ? elementTypes.join(', ') : 'general UI';
    const issuesStr = issueHints.length > 0 ? issueHints.join(', ') : 'unknown issues';

    return {
        elementTypes,
        issueHints,
        interpretedMeaning: `User is reporting ${issuesStr} with the ${elementsStr}`,
    };
}
