import { describe, expect, it } from 'vitest';
import { parseSnapshot } from './schema';

describe('parseSnapshot', () => {
    it('fills defaults on a minimal snapshot', () => {
        const result = parseSnapshot({
            url: 'http://localhost:3000/',
            viewport: { width: 1280, height: 800 },
            elements: [{ tagName: 'div', selector: 'div' }],
            page: {},
        });

        expect(result.success).toBe(true);
        if (!result.success) return;
        expect(result.snapshot.title).toBe('');
        expect(result.snapshot.elements).toEqual([
            { tagName: 'div', selector: 'div', classes: [], childrenCount: 0, isVisible: true },
        ]);
        expect(result.snapshot.page.globals).toEqual([]);
        expect(result.snapshot.page.inlineStyleCount).toBe(0);
    });

    it('reports every problem with its path', () => {
        const result = parseSnapshot({
            url: '',
            viewport: { width: 0, height: 800 },
            elements: [{ selector: 'div' }],
            page: {},
        });

        expect(result.success).toBe(false);
        if (result.success) return;
        expect(result.errors).toEqual([
            'url: String must contain at least 1 character(s)',
            'viewport.width: Number must be greater than 0',
            'elements.0.tagName: Required',
        ]);
    });

    it('rejects a value that is not an object', () => {
        expect(parseSnapshot(null)).toEqual({ success: false, errors: ['(root): Expected object, received null'] });
    });
});
