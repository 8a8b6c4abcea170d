import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { Scanner } from './index';

const { launch } = vi.hoisted(() => ({ launch: vi.fn() }));

vi.mock('puppeteer-core', () => ({ default: { launch } }));

const viewport = { width: 375, height: 667 };

function fakePage() {
    return {
        setViewport: vi.fn().mockResolvedValue(undefined),
        goto: vi.fn().mockResolvedValue(null),
        close: vi.fn().mockResolvedValue(undefined),
    };
}

describe('Scanner.loadPage', () => {
    let page: ReturnType<typeof fakePage>;

    beforeEach(() => {
        page = fakePage();
        launch.mockResolvedValue({
            newPage: vi.fn().mockResolvedValue(page),
            close: vi.fn().mockResolvedValue(undefined),
        });
    });

    afterEach(() => {
        vi.restoreAllMocks();
        launch.mockReset();
    });

    it('refuses to start without a browser path', async () => {
        await expect(new Scanner().loadPage('https://shop.test', viewport)).rejects.toThrow(/^No browser configured/);
        expect(launch).not.toHaveBeenCalled();
    });

    it('closes the page when the viewport cannot be set', async () => {
        page.setViewport.mockRejectedValue(new Error('Protocol error'));

        await expect(new Scanner({ executablePath: '/opt/chrome' }).loadPage('https://shop.test', viewport))
            .rejects.toThrow('Protocol error');
        expect(page.goto).not.toHaveBeenCalled();
        expect(page.close).toHaveBeenCalledTimes(1);
    });

    it('retries on DOMContentLoaded and closes the page when both loads fail', async () => {
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
        page.goto
            .mockRejectedValueOnce(new Error('Navigation timeout'))
            .mockRejectedValueOnce(new Error('net::ERR_NAME_NOT_RESOLVED'));

        await expect(new Scanner({ executablePath: '/opt/chrome' }).loadPage('https://shop.test', viewport))
            .rejects.toThrow('net::ERR_NAME_NOT_RESOLVED');
        expect(page.goto.mock.calls.map(call => call[1])).toEqual([
            { waitUntil: 'networkidle0' },
            { waitUntil: 'domcontentloaded' },
        ]);
        expect(warn).toHaveBeenCalledTimes(1);
        expect(page.close).toHaveBeenCalledTimes(1);
    });
});
