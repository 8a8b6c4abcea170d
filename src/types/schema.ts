import { z } from 'zod';
import { Snapshot } from './index';

export const BoundingBoxSchema = z.object({
    x: z.number(),
    y: z.number(),
    width: z.number(),
    height: z.number(),
});

export const ComputedStylesSchema = z.object({
    backgroundColor: z.string().optional(),
    color: z.string().optional(),
    fontSize: z.string().optional(),
    fontFamily: z.string().optional(),
    padding: z.string().optional(),
    margin: z.string().optional(),
    border: z.string().optional(),
    display: z.string().optional(),
    position: z.string().optional(),
    zIndex: z.string().optional(),
    flexDirection: z.string().optional(),
    justifyContent: z.string().optional(),
    alignItems: z.string().optional(),
    gap: z.string().optional(),
    width: z.string().optional(),
    height: z.string().optional(),
    overflowX: z.string().optional(),
});

export const ElementFactsSchema = z.object({
    tagName: z.string().min(1),
    selector: z.string().min(1),
    xpath: z.string().optional(),
    textContent: z.string().max(100).optional(),
    boundingBox: BoundingBoxSchema.optional(),
    ariaRole: z.string().optional(),
    ariaLabel: z.string().optional(),
    altText: z.string().optional(),
    classes: z.array(z.string()).default([]),
    elementId: z.string().optional(),
    computedStyles: ComputedStylesSchema.optional(),
    scroll: z.object({ scrollWidth: z.number(), clientWidth: z.number() }).optional(),
    childrenCount: z.number().int().nonnegative().default(0),
    isVisible: z.boolean().default(true),
});

export const PageFactsSchema = z.object({
    scripts: z.array(z.string()).default([]),
    stylesheets: z.array(z.string()).default([]),
    metas: z.array(z.object({ name: z.string(), content: z.string() })).default([]),
    globals: z.array(z.string()).default([]),
    attributes: z.array(z.string()).default([]),
    dataAttributes: z.array(z.string()).default([]),
    classNames: z.array(z.string()).max(500).default([]),
    inlineStyleCount: z.number().int().nonnegative().default(0),
    cssVariables: z.array(z.string()).default([]),
    htmlHints: z.array(z.string()).default([]),
});

export const SnapshotSchema = z.object({
    url: z.string().min(1),
    title: z.string().default(''),
    viewport: z.object({
        width: z.number().int().positive(),
        height: z.number().int().positive(),
    }),
    elements: z.array(ElementFactsSchema),
    page: PageFactsSchema,
});

export type SnapshotInput = z.input<typeof SnapshotSchema>;

export type SnapshotParseResult =
    | { success: true; snapshot: Snapshot }
    | { success: false; errors: string[] };

/**
 * Validates an untrusted value (usually JSON read from disk) as a Snapshot.
 * Missing list fields are filled with empty defaults.
 */
export function parseSnapshot(value: unknown): SnapshotParseResult {
    const result = SnapshotSchema.safeParse(value);
    if (!result.success) {
        return {
            success: false,
            errors: result.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
        };
    }
    return { success: true, snapshot: result.data };
}
