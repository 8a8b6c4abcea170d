#!/usr/bin/env node
import 'dotenv/config'; // Load environment variables
import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import * as fs from 'fs';
import * as path from 'path';
import type { Page } from 'puppeteer-core';
import { Analyzer, emptyPageFacts, fixSnapshot, MAX_AUDIT_ELEMENTS } from '../core/analyzer';
import { combinedSelector, describeCatalogue } from '../core/catalogue';
import { classifyAll } from '../core/classifier';
import { CONFIG_KEYS, ConfigManager, isConfigKey } from '../core/config';
import { detectIssues } from '../core/detector';
import { fingerprintStack, summarizeStack } from '../core/fingerprint';
import { interpretQuery } from '../core/query';
import { Scanner } from '../core/scanner';
import { extractElementFactsFromHtml, findHtmlFiles, readPageFacts } from '../core/static';
import {
    ClassifiedElement,
    ELEMENT_TYPES,
    ElementType,
    FixInstructionsResult,
    Issue,
    Severity,
    StackSummary,
    UIAnalysisResult,
} from '../types';
import { parseSnapshot } from '../types/schema';

const program = new Command();
const configManager = new ConfigManager();

interface PageFlags {
    width?: number;
    height?: number;
    json?: boolean;
    contrast?: boolean;
}

function parsePositiveInt(value: string): number {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed <= 0) {
        throw new InvalidArgumentError('Must be a positive integer.');
    }
    return parsed;
}

function parseElementType(value: string): ElementType {
    const type = ELEMENT_TYPES.find(t => t === value);
    if (!type) {
        throw new InvalidArgumentError(`Expected one of: ${ELEMENT_TYPES.join(', ')}`);
    }
    return type;
}

function pageCommand(name: string, description: string): Command {
    return program
        .command(name)
        .description(description)
        .option('--width <px>', 'Viewport width', parsePositiveInt)
        .option('--height <px>', 'Viewport height', parsePositiveInt)
        .option('--json', 'Print raw JSON');
}

/** Wraps a command body: unexpected errors are reported and exit with code 2. */
function guarded<A extends unknown[]>(task: (...args: A) => Promise<void>): (...args: A) => Promise<void> {
    return async (...args: A) => {
        try {
            await task(...args);
        } catch (error) {
            console.error(chalk.red('Error during execution:'), error instanceof Error ? error.message : error);
            process.exit(2);
        }
    };
}

async function withAnalyzer<T>(flags: PageFlags, task: (analyzer: Analyzer<Page>) => Promise<T>): Promise<T> {
    const settings = configManager.resolve({ viewportWidth: flags.width, viewportHeight: flags.height });
    const scanner = new Scanner({ executablePath: settings.chromePath, headless: settings.headless });
    const analyzer = new Analyzer(scanner, {
        viewport: settings.viewport,
        maxElements: settings.maxElements,
        checkContrast: flags.contrast,
    });

    try {
        return await task(analyzer);
    } finally {
        await scanner.close();
    }
}

function printJson(value: unknown) {
    console.log(JSON.stringify(value, null, 2));
}

function severityColor(severity: Severity) {
    return severity === 'error' ? chalk.red :
        severity === 'warning' ? chalk.yellow : chalk.gray;
}

function printIssues(issues: readonly Issue[]) {
    console.log(chalk.yellow(`Found ${issues.length} issues.`));
    issues.forEach(issue => {
        const color = severityColor(issue.severity);
        console.log(color(`[${issue.severity.toUpperCase()}] ${issue.kind}: ${issue.description}`));
        console.log(chalk.gray(`  Selector: ${issue.selector}`));
        console.log(chalk.gray(`  Fix: ${issue.suggestedFix}`));
    });
}

function printElements(elements: readonly ClassifiedElement[]) {
    elements.forEach(el => {
        const hidden = el.isVisible ? '' : chalk.gray(' (hidden)');
        console.log(`${chalk.cyan(el.elementType.padEnd(10))} ${el.selector}${hidden}`);
        if (el.textContent) console.log(chalk.gray(`  Text: ${el.textContent}`));
        if (el.boundingBox) {
            const { x, y, width, height } = el.boundingBox;
            console.log(chalk.gray(`  Box: ${Math.round(width)}x${Math.round(height)} at (${Math.round(x)}, ${Math.round(y)})`));
        }
    });
}

function printAnalysis(result: UIAnalysisResult) {
    console.log(chalk.bold(result.pageTitle || '(untitled)') + chalk.gray(` ${result.url} @ ${result.viewportWidth}x${result.viewportHeight}`));
    result.analysisNotes.forEach(note => console.log(chalk.blue(note)));

    console.log(chalk.blue(`\nElements (${result.elements.length}):`));
    for (const [type, count] of Object.entries(result.elementsSummary)) {
        console.log(`  ${type}: ${count}`);
    }

    console.log('');
    printIssues(result.issues);

    if (result.domStructure) {
        console.log(chalk.blue('\nDOM outline:'));
        console.log(result.domStructure);
    }
}

function printFixes(result: FixInstructionsResult) {
    console.log(chalk.blue(result.interpretedProblem));
    console.log(chalk.green(result.summary));

    result.fixInstructions.forEach(fix => {
        console.log(chalk.bold(`\n${fix.priority}. ${fix.targetDescription}`) + chalk.gray(` [${fix.action}]`));
        console.log(chalk.gray(`  Selector: ${fix.selector}`));
        if (fix.fileHint) console.log(chalk.gray(`  File hint: ${fix.fileHint}`));
        console.log(`  ${fix.explanation}`);
    });

    if (result.cssChanges) {
        console.log(chalk.blue('\nCSS changes:'));
        console.log(result.cssChanges);
    }
    if (result.htmlChanges) {
        console.log(chalk.blue('\nHTML changes:'));
        console.log(result.htmlChanges);
    }
    if (result.additionalRecommendations.length > 0) {
        console.log(chalk.blue('\nRecommendations:'));
        result.additionalRecommendations.forEach(rec => console.log(`  - ${rec}`));
    }
}

function printStack(summary: StackSummary) {
    console.log(chalk.bold(summary.summary));
    console.log(`  Primary framework: ${summary.primaryFramework}`);
    if (summary.metaFramework) console.log(`  Meta framework: ${summary.metaFramework}`);
    console.log(`  CSS approach: ${summary.cssApproach}`);
    if (summary.uiLibrary) console.log(`  UI library: ${summary.uiLibrary}`);

    console.log(chalk.blue('\nDetected:'));
    summary.frameworks.forEach(f => {
        console.log(`  ${f.name} ${chalk.gray(`(${f.category}, ${f.confidence} confidence)`)}`);
    });

    console.log(chalk.blue('\nHow to fix UI in this stack:'));
    console.log(summary.fixApproach);
}

program
    .name('ui-lens')
    .description('Heuristic UI analysis for rendered web pages')
    .version('1.0.0');

program
    .command('config')
    .description('Manage configuration')
    .argument('<action>', 'Action to perform (set, get, delete, list)')
    .argument('[key]', `Configuration key (${CONFIG_KEYS.join(', ')})`)
    .argument('[value]', 'Configuration value')
    .action((action: string, key: string | undefined, value: string | undefined) => {
        if (action === 'list') {
            printJson(configManager.list());
            return;
        }
        if (!key) {
            console.error(chalk.red(`Error: key is required for ${action} action.`));
            return;
        }
        if (!isConfigKey(key)) {
            console.error(chalk.red(`Unknown key: ${key}. Use one of ${CONFIG_KEYS.join(', ')}.`));
            return;
        }

        if (action === 'set') {
            if (value === undefined) {
                console.error(chalk.red('Error: key and value are required for set action.'));
                return;
            }
            try {
                configManager.set(key, value);
            } catch (e) {
                console.error(chalk.red(e instanceof Error ? e.message : String(e)));
                process.exit(1);
            }
            console.log(chalk.green(`Configuration updated: ${key} = ${value}`));
        } else if (action === 'get') {
            const val = configManager.get(key);
            console.log(val !== undefined ? String(val) : chalk.gray('undefined'));
        } else if (action === 'delete') {
            configManager.delete(key);
            console.log(chalk.green(`Configuration deleted: ${key}`));
        } else {
            console.error(chalk.red('Invalid action. Use set, get, delete or list.'));
        }
    });

pageCommand('analyze <url>', 'Classify elements, detect issues and outline the page')
    .option('-q, --query <text>', 'Vague complaint to focus the analysis, e.g. "the navbar is broken"')
    .option('--no-screenshot', 'Skip the full-page screenshot')
    .option('--contrast', 'Also check text colour contrast')
    .option('--output <file>', 'Write the full result as JSON')
    .action(guarded(async (url: string, options: PageFlags & { query?: string; screenshot: boolean; output?: string }) => {
        console.log(chalk.blue(`Analyzing: ${url}`));
        const result = await withAnalyzer(options, analyzer =>
            analyzer.analyzePage(url, { query: options.query, includeScreenshot: options.screenshot }));

        if (options.output) {
            fs.writeFileSync(options.output, JSON.stringify(result, null, 2));
            console.log(chalk.green(`Analysis written to ${options.output}`));
        }
        if (options.json) {
            printJson(result);
        } else {
            printAnalysis(result);
        }
    }));

pageCommand('fix', 'Turn a vague complaint into ordered fix instructions')
    .argument('<args...>', '<url> <complaint>, or just <complaint> with --snapshot')
    .option('--snapshot <file>', 'Work offline from a snapshot saved by `ui-lens snapshot`')
    .option('--contrast', 'Also check text colour contrast')
    .action(guarded(async (args: string[], options: PageFlags & { snapshot?: string }) => {
        let result: FixInstructionsResult;

        if (options.snapshot) {
            const parsed = parseSnapshot(JSON.parse(fs.readFileSync(options.snapshot, 'utf-8')));
            if (!parsed.success) {
                console.error(chalk.red(`Invalid snapshot ${options.snapshot}:`));
                parsed.errors.forEach(err => console.error(chalk.red(`  ${err}`)));
                process.exit(1);
            }
            result = fixSnapshot(parsed.snapshot, args.join(' '), options.contrast);
        } else {
            const [url, ...complaint] = args;
            if (complaint.length === 0) {
                console.error(chalk.red('Error: a complaint is required, e.g. ui-lens fix http://localhost:3000 "the navbar is broken"'));
                process.exit(1);
            }
            result = await withAnalyzer(options, analyzer => analyzer.getFixInstructions(url, complaint.join(' ')));
        }

        if (options.json) {
            printJson(result);
        } else {
            printFixes(result);
        }
    }));

pageCommand('elements <url>', 'Show every element of one type')
    .argument('<type>', `Element type (${ELEMENT_TYPES.join(', ')})`, parseElementType)
    .action(guarded(async (url: string, elementType: ElementType, options: PageFlags) => {
        const elements = await withAnalyzer(options, analyzer => analyzer.getElementDetails(url, elementType));

        if (options.json) {
            printJson(elements);
        } else {
            console.log(chalk.blue(`Found ${elements.length} ${elementType} elements.`));
            printElements(elements);
        }
    }));

pageCommand('screenshot <url>', 'Capture a PNG, optionally highlighting elements')
    .requiredOption('--output <file>', 'PNG file to write')
    .option('--type <type>', 'Highlight every element of this type', parseElementType)
    .option('--selector <css>', 'Highlight elements matching this selector')
    .option('--viewport-only', 'Capture the viewport instead of the full page')
    .action(guarded(async (url: string, options: PageFlags & {
        output: string;
        type?: ElementType;
        selector?: string;
        viewportOnly?: boolean;
    }) => {
        const png = await withAnalyzer(options, analyzer => analyzer.getScreenshot(url, {
            elementType: options.type,
            selector: options.selector,
            fullPage: !options.viewportOnly,
        }));
        fs.writeFileSync(options.output, png);
        console.log(chalk.green(`Screenshot written to ${options.output}`));
    }));

pageCommand('a11y <url>', 'Print the accessibility tree')
    .action(guarded(async (url: string, options: PageFlags) => {
        const tree = await withAnalyzer(options, analyzer => analyzer.getAccessibilitySnapshot(url));
        if (options.json) {
            printJson({ url, accessibilityTree: tree });
        } else {
            console.log(tree || chalk.gray('(empty accessibility tree)'));
        }
    }));

pageCommand('dom <url>', 'Print an outline of the structural DOM')
    .option('--depth <n>', 'Maximum depth', parsePositiveInt, 5)
    .action(guarded(async (url: string, options: PageFlags & { depth: number }) => {
        const outline = await withAnalyzer(options, analyzer => analyzer.getDomOverview(url, options.depth));
        if (options.json) {
            printJson({ url, domStructure: outline });
        } else {
            console.log(outline);
        }
    }));

program
    .command('viewports <url>')
    .description('Compare element visibility at mobile, tablet and desktop sizes')
    .option('--screenshots <dir>', 'Write one PNG per viewport into this folder')
    .option('--json', 'Print raw JSON')
    .action(guarded(async (url: string, options: { screenshots?: string; json?: boolean }) => {
        const reports = await withAnalyzer({}, analyzer => analyzer.compareViewports(url));

        if (options.screenshots) {
            fs.mkdirSync(options.screenshots, { recursive: true });
            for (const [name, report] of Object.entries(reports)) {
                fs.writeFileSync(path.join(options.screenshots, `${name}.png`), Buffer.from(report.screenshotBase64, 'base64'));
            }
            console.log(chalk.green(`Screenshots written to ${options.screenshots}`));
        }

        if (options.json) {
            printJson(reports);
            return;
        }
        for (const [name, report] of Object.entries(reports)) {
            console.log(`${chalk.cyan(name.padEnd(8))} ${report.width}x${report.height}: ${report.visibleElements}/${report.totalElements} elements visible`);
        }
    }));

program
    .command('stack <target>')
    .description('Fingerprint the tech stack of a URL, or of a local HTML file or folder')
    .option('--json', 'Print raw JSON')
    .action(guarded(async (target: string, options: { json?: boolean }) => {
        let summary: StackSummary;
        if (/^https?:\/\//.test(target)) {
            summary = (await withAnalyzer({}, analyzer => analyzer.getTechStack(target))).summary;
        } else {
            console.log(chalk.gray(`Reading HTML under ${target} (no scripts run; runtime globals are not visible)`));
            summary = summarizeStack(fingerprintStack(await readPageFacts(target)));
        }

        if (options.json) {
            printJson(summary);
        } else {
            printStack(summary);
        }
    }));

program
    .command('classify <target>')
    .description('Classify and audit the elements of a local HTML file or folder, without a browser')
    .option('--json', 'Print raw JSON')
    .action(guarded(async (target: string, options: { json?: boolean }) => {
        const { maxElements, viewport } = configManager.resolve();
        const reports = (await findHtmlFiles(target)).map(file => {
            const html = fs.readFileSync(file, 'utf-8');
            const elements = classifyAll(extractElementFactsFromHtml(html, combinedSelector(), maxElements));
            const audit = extractElementFactsFromHtml(html, 'body *', MAX_AUDIT_ELEMENTS);
            const issues = detectIssues({ url: file, title: '', viewport, elements: audit, page: emptyPageFacts() });
            return { file, elements, issues };
        });

        if (options.json) {
            printJson(reports);
            return;
        }
        if (reports.length === 0) {
            console.log(chalk.yellow(`No HTML files found in ${target}`));
        }
        reports.forEach(report => {
            console.log(chalk.blue(`\n${path.relative(process.cwd(), report.file) || report.file}`));
            printElements(report.elements);
            printIssues(report.issues);
        });
    }));

pageCommand('snapshot <url>', 'Save page facts for offline `fix --snapshot`')
    .requiredOption('--output <file>', 'JSON file to write')
    .action(guarded(async (url: string, options: PageFlags & { output: string }) => {
        const snapshot = await withAnalyzer(options, analyzer => analyzer.captureSnapshot(url));
        fs.writeFileSync(options.output, JSON.stringify(snapshot, null, 2));
        console.log(chalk.green(`Snapshot of ${snapshot.elements.length} elements written to ${options.output}`));
    }));

program
    .command('interpret <query...>')
    .description('Show how a complaint is read, without loading a page')
    .option('--json', 'Print raw JSON')
    .action((query: string[], options: { json?: boolean }) => {
        const result = interpretQuery(query.join(' '));
        if (options.json) {
            printJson(result);
            return;
        }
        console.log(chalk.blue(result.interpretedMeaning));
        console.log(`  Element types: ${result.elementTypes.join(', ') || chalk.gray('none')}`);
        console.log(`  Issue hints: ${result.issueHints.join(', ') || chalk.gray('none')}`);
    });

program
    .command('selectors')
    .description('Print the selector catalogue')
    .action(() => {
        console.log(describeCatalogue());
    });

program.parseAsync(process.argv).catch((error: unknown) => {
    console.error(chalk.red('Error during execution:'), error);
    process.exit(2);
});
