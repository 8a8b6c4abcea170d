import { ElementFacts, PageFacts, Snapshot } from '../types';

export function element(overrides: Partial<ElementFacts> = {}): ElementFacts {
    return {
        tagName: 'div',
        selector: 'div',
        classes: [],
        childrenCount: 1,
        isVisible: true,
        ...overrides,
    };
}

export function page(overrides: Partial<PageFacts> = {}): PageFacts {
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
        ...overrides,
    };
}

export function snapshot(elements: ElementFacts[], overrides: Partial<Snapshot> = {}): Snapshot {
    return {
        url: 'http://localhost:3000/',
        title: 'Test page',
        viewport: { width: 1280, height: 800 },
        elements,
        page: page(),
        ...overrides,
    };
}
