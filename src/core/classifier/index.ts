import { ClassifiedElement, ElementFacts, ElementType } from '../../types';

// Lookups are ordered: the first entry that matches wins.
type KeywordTable = ReadonlyArray<readonly [string, ElementType]>;

const TAG_TYPES: ReadonlyMap<string, ElementType> = new Map<string, ElementType>([
    ['nav', 'navbar'],
    ['header', 'header'],
    ['footer', 'footer'],
    ['button', 'button'],
    ['form', 'form'],
    ['input', 'input'],
    ['textarea', 'input'],
    ['select', 'input'],
    ['img', 'image'],
    ['picture', 'image'],
    ['svg', 'image'],
    ['aside', 'sidebar'],
    ['section', 'section'],
    ['main', 'container'],
    ['h1', 'heading'],
    ['h2', 'heading'],
    ['h3', 'heading'],
    ['h4', 'heading'],
    ['h5', 'heading'],
    ['h6', 'heading'],
    ['a', 'link'],
]);

const ROLE_TYPES: ReadonlyMap<string, ElementType> = new Map<string, ElementType>([
    ['navigation', 'navbar'],
    ['banner', 'header'],
    ['contentinfo', 'footer'],
    ['button', 'button'],
    ['link', 'link'],
    ['form', 'form'],
    ['textbox', 'input'],
    ['dialog', 'modal'],
    ['menu', 'dropdown'],
    ['heading', 'heading'],
    ['img', 'image'],
    ['complementary', 'sidebar'],
    ['main', 'container'],
    ['region', 'section'],
]);

// Declaration order is behaviour: "nav-card" is a navbar, "menu-card" a card.
export const CLASS_KEYWORDS: KeywordTable = [
    ['hero', 'hero'],
    ['navbar', 'navbar'],
    ['nav', 'navbar'],
    ['navigation', 'navbar'],
    ['header', 'header'],
    ['footer', 'footer'],
    ['card', 'card'],
    ['btn', 'button'],
    ['button', 'button'],
    ['sidebar', 'sidebar'],
    ['modal', 'modal'],
    ['dialog', 'modal'],
    ['dropdown', 'dropdown'],
    ['menu', 'dropdown'],
    ['form', 'form'],
    ['container', 'container'],
    ['wrapper', 'container'],
];

function matchKeyword(value: string): ElementType | undefined {
    for (const [keyword, type] of CLASS_KEYWORDS) {
        if (value.includes(keyword)) return type;
    }
    return undefined;
}

/**
 * Derives the semantic type of one element. Tag beats role, role beats class,
 * class beats id; anything unmatched is `other`.
 */
export function classify(facts: ElementFacts): ElementType {
    const tag = (facts.tagName || '').toLowerCase();
    const byTag = TAG_TYPES.get(tag);
    if (byTag) return byTag;

    const role = (facts.ariaRole || '').toLowerCase();
    const byRole = ROLE_TYPES.get(role);
    if (byRole) return byRole;

    for (const cls of facts.classes || []) {
        const byClass = matchKeyword(cls.toLowerCase());
        if (byClass) return byClass;
    }

    const id = (facts.elementId || '').toLowerCase();
    if (id) {
        const byId = matchKeyword(id);
        if (byId) return byId;
    }

    return 'other';
}

export function classifyAll(elements: readonly ElementFacts[]): ClassifiedElement[] {
    return elements.map(facts => ({ ...facts, elementType: classify(facts) }));
}
