// @vitest-environment jsdom
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import {
    appendLogEntry,
    buildGenerationFormData,
    createChannelId,
    findFormElements,
    isGenerateResponse,
    mountGenerationForm,
    parseLogEvent,
    submitGeneration,
} from './generationForm';
import type { GenerationFormElements } from './generationForm';

const MARKUP = `
<form id="generateForm">
  <input id="topic" name="topic" type="text">
  <input id="slides" name="slide_count" type="number" value="3">
  <input id="url_link" name="url_link" type="url">
  <input id="pdf_file" name="pdf_file" type="file">
  <input id="enableVideo" name="enable_video" type="checkbox">
  <button type="submit" class="btn-primary">Generate</button>
</form>
<div id="logWindow" hidden></div>`;

function elements(): GenerationFormElements {
    const found = findFormElements(document);
    if (!found) throw new Error('form markup missing');
    return found;
}

const jsonResponse = (body: unknown, status = 200) =>
    new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });

class FakeEventSource {
    static instances: FakeEventSource[] = [];
    readonly listeners = new Map<string, (event: { data: string }) => void>();

    constructor(readonly url: string) {
        FakeEventSource.instances.push(this);
    }

    addEventListener(type: string, listener: (event: { data: string }) => void) {
        this.listeners.set(type, listener);
    }

    emit(type: string, data: string) {
        this.listeners.get(type)?.({ data });
    }
}

beforeEach(() => {
    document.body.innerHTML = MARKUP;
});

afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllGlobals();
    FakeEventSource.instances = [];
});

describe('findFormElements', () => {
    it('returns null when markup is missing', () => {
        document.body.innerHTML = '<form id="generateForm"></form>';
        expect(findFormElements(document)).toBeNull();
    });
});

describe('buildGenerationFormData', () => {
    it('collects the form fields under their wire names', () => {
        const els = elements();
        els.topic.value = '  Mars colonization  ';
        els.slides.value = '4';
        els.enableVideo.checked = true;
        els.urlLink.value = ' https://example.com/mars ';

        const data = buildGenerationFormData(els, 'tab-1');

        expect(data?.get('topic')).toBe('Mars colonization');
        expect(data?.get('slide_count')).toBe('4');
        expect(data?.get('enable_video')).toBe('true');
        expect(data?.get('url_link')).toBe('https://example.com/mars');
        expect(data?.get('log_channel')).toBe('tab-1');
        expect(data?.has('pdf_file')).toBe(false);
    });

    it('sends enable_video=false when unchecked', () => {
        const els = elements();
        els.topic.value = 'Mars';

        expect(buildGenerationFormData(els, 'tab-1')?.get('enable_video')).toBe('false');
    });

    it('returns null for a blank topic', () => {
        const els = elements();
        els.topic.value = '   ';

        expect(buildGenerationFormData(els, 'tab-1')).toBeNull();
    });
});

describe('isGenerateResponse', () => {
    it.each([
        [{ success: true, redirect: '/viewer/1' }, true],
        [{ success: false, error: 'nope' }, true],
        [{ success: true }, false],
        [{ success: false, error: 42 }, false],
        ['<html>', false],
        [null, false],
    ])('%j -> %s', (value, expected) => {
        expect(isGenerateResponse(value)).toBe(expected);
    });
});

describe('submitGeneration', () => {
    it('posts the form to /generate', async () => {
        const fetchImpl = vi.fn(async () => jsonResponse({ success: true, redirect: '/viewer/abc' }));
        const body = new FormData();

        await expect(submitGeneration(body, fetchImpl)).resolves.toEqual({ success: true, redirect: '/viewer/abc' });
        expect(fetchImpl).toHaveBeenCalledWith('/generate', { method: 'POST', body });
    });

    it('names the progress channel in the query string', async () => {
        const fetchImpl = vi.fn(async () => jsonResponse({ success: true, redirect: '/viewer/abc' }));
        const body = new FormData();

        await submitGeneration(body, fetchImpl, 'tab-1');

        expect(fetchImpl).toHaveBeenCalledWith('/generate?log_channel=tab-1', { method: 'POST', body });
    });

    it('rejects a body it does not understand', async () => {
        const fetchImpl = vi.fn(async () => jsonResponse({ status: 'bad gateway' }, 502));

        await expect(submitGeneration(new FormData(), fetchImpl)).rejects.toThrow(
            'Unexpected response from server (HTTP 502)'
        );
    });
});

describe('createChannelId', () => {
    it('hex-encodes 16 random bytes', () => {
        const random = {
            getRandomValues(array: Uint8Array) {
                array.forEach((_, i) => { array[i] = i * 17; });
                return array;
            },
        };

        expect(createChannelId(random)).toBe('00112233445566778899aabbccddeeff');
    });
});

describe('log window', () => {
    it('appends timestamped entries and reveals the window', () => {
        const logWindow = elements().logWindow;

        appendLogEntry(logWindow, 'Slide 1: image ready.', new Date(2026, 0, 1, 9, 5, 7));

        expect(logWindow.hidden).toBe(false);
        expect(logWindow.querySelector('.log-entry')?.textContent).toBe('[09:05:07] Slide 1: image ready.');
    });

    it('parses log events', () => {
        vi.spyOn(console, 'warn').mockImplementation(() => { });

        expect(parseLogEvent('{"msg":"hello"}')).toEqual({ msg: 'hello' });
        expect(parseLogEvent('{"message":"hello"}')).toBeNull();
        expect(parseLogEvent('not json')).toBeNull();
    });
});

describe('mountGenerationForm', () => {
    beforeEach(() => {
        vi.stubGlobal('EventSource', FakeEventSource);
    });

    it('subscribes to a progress channel and shows its messages', () => {
        mountGenerationForm(window);

        const [source] = FakeEventSource.instances;
        expect(source?.url).toMatch(/^\/events\?channel=[0-9a-f]{32}$/);

        source?.emit('log', '{"msg":"Planning deck with the reasoning model..."}');
        expect(elements().logWindow.textContent).toContain('Planning deck with the reasoning model...');
    });

    it('mounts on an origin without crypto.randomUUID', async () => {
        const realCrypto = globalThis.crypto;
        vi.stubGlobal('crypto', { getRandomValues: (array: Uint8Array) => realCrypto.getRandomValues(array) });
        const fetchImpl = vi.fn(async () => jsonResponse({ success: false, error: 'Enter a topic' }, 400));
        vi.stubGlobal('fetch', fetchImpl);
        vi.stubGlobal('alert', vi.fn());

        expect(() => mountGenerationForm(window)).not.toThrow();
        const channel = FakeEventSource.instances[0]?.url.split('=')[1];
        expect(channel).toMatch(/^[0-9a-f]{32}$/);

        const els = elements();
        els.topic.value = 'Mars';
        els.form.dispatchEvent(new Event('submit', { cancelable: true }));

        await vi.waitFor(() => expect(fetchImpl).toHaveBeenCalledTimes(1));
        expect(fetchImpl.mock.calls[0]).toEqual([`/generate?log_channel=${channel}`, expect.objectContaining({ method: 'POST' })]);
    });

    it('alerts instead of submitting without a topic', () => {
        const alert = vi.fn();
        const fetchImpl = vi.fn();
        vi.stubGlobal('alert', alert);
        vi.stubGlobal('fetch', fetchImpl);
        mountGenerationForm(window);

        elements().form.dispatchEvent(new Event('submit', { cancelable: true }));

        expect(alert).toHaveBeenCalledWith('Enter a topic');
        expect(fetchImpl).not.toHaveBeenCalled();
    });

    it('shows the server error and re-enables the button', async () => {
        const alert = vi.fn();
        vi.stubGlobal('alert', alert);
        vi.stubGlobal('fetch', vi.fn(async () => jsonResponse({ success: false, error: 'Enter a topic' }, 400)));
        mountGenerationForm(window);
        const els = elements();
        els.topic.value = 'Mars';

        els.form.dispatchEvent(new Event('submit', { cancelable: true }));
        expect(els.button.disabled).toBe(true);
        expect(els.button.textContent).toBe('Processing...');

        await vi.waitFor(() => expect(alert).toHaveBeenCalledWith('Enter a topic'));
        expect(els.button.disabled).toBe(false);
        expect(els.button.textContent).toBe('Generate');
    });
});
