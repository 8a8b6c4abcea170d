export const ELEMENT_TYPES = [
    'button',
    'link',
    'heading',
    'navbar',
    'header',
    'footer',
    'hero',
    'form',
    'input',
    'image',
    'section',
    'card',
    'modal',
    'dropdown',
    'sidebar',
    'container',
    'other',
] as const;

export type ElementType = typeof ELEMENT_TYPES[number];

export const ISSUE_KINDS = [
    'layout_broken',
    'overflow_hidden',
    'z_index_conflict',
    'spacing_inconsistent',
    'alignment_off',
    'responsive_issue',
    'accessibility_missing',
    'contrast_low',
    'element_overlap',
    'invisible_element',
    'empty_container',
    'orphaned_element',
    'style_inconsistency',
    'missing_hover_state',
    'broken_flexbox',
    'broken_grid',
    'font_issue',
    'color_issue',
    'size_issue',
    'position_issue',
    'other',
] as const;

export type IssueKind = typeof ISSUE_KINDS[number];

export const ISSUE_HINTS = [
    'broken',
    'alignment',
    'spacing',
    'overlap',
    'size',
    'visibility',
    'color',
    'responsive',
    'layout',
    'text',
    'position',
] as const;

export type IssueHint = typeof ISSUE_HINTS[number];

export const FIX_ACTIONS = [
    'modify_css',
    'add_css',
    'remove_css',
    'modify_html',
    'add_html',
    'remove_html',
    'wrap_element',
    'unwrap_element',
    'move_element',
    'add_class',
    'remove_class',
    'restructure',
] as const;

export type FixAction = typeof FIX_ACTIONS[number];

export type Severity = 'error' | 'warning' | 'info';

export type Confidence = 'high' | 'medium' | 'low';

export interface BoundingBox {
    x: number;
    y: number;
    width: number;
    height: number;
}

export interface ComputedStyles {
    backgroundColor?: string;
    color?: string;
    fontSize?: string;
    fontFamily?: string;
    padding?: string;
    margin?: string;
    border?: string;
    display?: string;
    position?: string;
    zIndex?: string;
    flexDirection?: string;
    justifyContent?: string;
    alignItems?: string;
    gap?: string;
    width?: string;
    height?: string;
    overflowX?: string;
}

export interface ScrollMetrics {
    scrollWidth: number;
    clientWidth: number;
}

/**
 * Raw facts about one rendered element, as produced by an extractor.
 * Optional fields are "no signal", never an error.
 */
export interface ElementFacts {
    tagName: string;
    selector: string;
    xpath?: string;
    textContent?: string; // truncated to 100 chars
    boundingBox?: BoundingBox;
    ariaRole?: string;
    ariaLabel?: string;
    altText?: string;
    classes: string[];
    elementId?: string;
    computedStyles?: ComputedStyles;
    scroll?: ScrollMetrics;
    childrenCount: number;
    isVisible: boolean;
}

export interface ClassifiedElement extends ElementFacts {
    elementType: ElementType;
}

export interface MetaTag {
    name: string;
    content: string;
}

export interface PageFacts {
    scripts: string[];
    stylesheets: string[];
    metas: MetaTag[];
    globals: string[];
    attributes: string[]; // framework-specific attribute names (ng-*, v-*, *react*, ...)
    dataAttributes: string[];
    classNames: string[];
    inlineStyleCount: number;
    cssVariables: string[];
    htmlHints: string[];
}

export interface Viewport {
    width: number;
    height: number;
}

export interface Snapshot {
    url: string;
    title: string;
    viewport: Viewport;
    elements: ElementFacts[];
    page: PageFacts;
}

export interface Issue {
    severity: Severity;
    selector: string;
    elementType: ElementType;
    kind: IssueKind;
    description: string;
    suggestedFix: string;
    cssProperty?: string;
    currentValue?: string;
    recommendedValue?: string;
    codeSnippet?: string;
}

export interface QueryInterpretation {
    elementTypes: ElementType[];
    issueHints: IssueHint[];
    interpretedMeaning: string;
}

export interface FixInstruction {
    priority: number;
    targetDescription: string;
    selector: string;
    fileHint?: string;
    action: FixAction;
    propertyChanges: Record<string, string>;
    beforeCode?: string;
    afterCode?: string;
    explanation: string;
}

export interface FixInstructionsResult {
    url: string;
    userQuery: string;
    interpretedProblem: string;
    affectedElements: ClassifiedElement[];
    fixInstructions: FixInstruction[];
    summary: string;
    cssChanges: string;
    htmlChanges: string;
    additionalRecommendations: string[];
}

export type FrameworkCategory =
    | 'js_framework'
    | 'css_framework'
    | 'ui_library'
    | 'build_tool'
    | 'meta_framework'
    | 'other';

export interface FrameworkInfo {
    name: string;
    category: FrameworkCategory;
    confidence: Confidence;
    indicators: string[];
}

export type CssApproach =
    | 'tailwind'
    | 'bootstrap'
    | 'component-library'
    | 'css-modules'
    | 'inline-styles'
    | 'traditional-css';

export interface TechStackResult {
    primaryFramework: string;
    metaFramework: string | null;
    cssApproach: CssApproach;
    frameworks: FrameworkInfo[];

    hasReact: boolean;
    hasVue: boolean;
    hasAngular: boolean;
    hasSvelte: boolean;
    hasNextjs: boolean;
    hasNuxt: boolean;
    hasRemix: boolean;
    hasAstro: boolean;
    hasGatsby: boolean;
    hasVite: boolean;

    hasTailwind: boolean;
    hasBootstrap: boolean;
    hasMaterialUi: boolean;
    hasChakraUi: boolean;
    hasShadcn: boolean;
    hasAntDesign: boolean;
    hasBulma: boolean;
    hasFoundation: boolean;

    hasVanillaJs: boolean;
    hasJquery: boolean;
    hasTypescript: boolean;

    usesCssModules: boolean;
    usesStyledComponents: boolean;
    usesEmotion: boolean;
    usesSass: boolean;
    usesInlineStyles: boolean;
    usesCssVariables: boolean;

    bundlerHints: string[];
    summary: string;
    fixApproach: string;
}

/** Compact view of a TechStackResult for API consumers. */
export interface StackSummary {
    primaryFramework: string;
    metaFramework: string | null;
    cssApproach: CssApproach;
    uiLibrary: string | null;
    frameworks: Array<Pick<FrameworkInfo, 'name' | 'category' | 'confidence'>>;
    summary: string;
    fixApproach: string;
    details: Pick<TechStackResult, 'hasTailwind' | 'hasBootstrap' | 'usesCssModules' | 'usesCssVariables' | 'usesInlineStyles'>;
}

export interface UIAnalysisResult {
    url: string;
    pageTitle: string;
    viewportWidth: number;
    viewportHeight: number;
    elementsSummary: Record<string, number>;
    elements: ClassifiedElement[];
    issues: Issue[];
    accessibilityTree: string;
    domStructure: string;
    screenshotBase64: string | null;
    analysisNotes: string[];
}

export interface ViewportSpec extends Viewport {
    name: string;
}

export interface ViewportReport {
    width: number;
    height: number;
    visibleElements: number;
    totalElements: number;
    screenshotBase64: string;
}

export interface ScreenshotOptions {
    fullPage: boolean;
    /** Elements matching this selector are outlined in red for the capture. */
    highlightSelector?: string;
}

/**
 * Everything the analyzer needs from a browser. `TPage` is the driver's own
 * page handle; the analyzer only passes it back.
 */
export interface PageDriver<TPage> {
    loadPage(url: string, viewport: Viewport): Promise<TPage>;
    getTitle(page: TPage): Promise<string>;
    extractElementFacts(page: TPage, selector: string, cap: number): Promise<ElementFacts[]>;
    extractPageFacts(page: TPage): Promise<PageFacts>;
    captureScreenshot(page: TPage, options: ScreenshotOptions): Promise<Buffer>;
    extractAccessibilityTree(page: TPage): Promise<string>;
    extractDomOutline(page: TPage, maxDepth: number): Promise<string>;
    closePage(page: TPage): Promise<void>;
    close(): Promise<void>;
}
