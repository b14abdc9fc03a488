import type { GenerateResponse, LogEvent } from '@shared/types';

const GENERATE_LABEL = 'Generate';

export interface GenerationFormElements {
    form: HTMLFormElement;
    topic: HTMLInputElement;
    slides: HTMLInputElement;
    enableVideo: HTMLInputElement;
    urlLink: HTMLInputElement;
    pdfFile: HTMLInputElement;
    button: HTMLButtonElement;
    logWindow: HTMLElement;
}

export function findFormElements(doc: Document): GenerationFormElements | null {
    const form = doc.getElementById('generateForm');
    const topic = doc.getElementById('topic');
    const slides = doc.getElementById('slides');
    const enableVideo = doc.getElementById('enableVideo');
    const urlLink = doc.getElementById('url_link');
    const pdfFile = doc.getElementById('pdf_file');
    const button = doc.querySelector('.btn-primary');
    const logWindow = doc.getElementById('logWindow');

    if (
        !(form instanceof HTMLFormElement) ||
        !(topic instanceof HTMLInputElement) ||
        !(slides instanceof HTMLInputElement) ||
        !(enableVideo instanceof HTMLInputElement) ||
        !(urlLink instanceof HTMLInputElement) ||
        !(pdfFile instanceof HTMLInputElement) ||
        !(button instanceof HTMLButtonElement) ||
        !logWindow
    ) {
        return null;
    }
    return { form, topic, slides, enableVideo, urlLink, pdfFile, button, logWindow };
}

/**
 * Builds the multipart body, or returns null when there is no topic to send.
 */
export function buildGenerationFormData(elements: GenerationFormElements, channel: string): FormData | null {
    const topic = elements.topic.value.trim();
    if (!topic) return null;

    const formData = new FormData();
    formData.append('topic', topic);
    formData.append('slide_count', elements.slides.value);
    formData.append('enable_video', String(elements.enableVideo.checked));
    formData.append('url_link', elements.urlLink.value.trim());
    formData.append('log_channel', channel);

    const pdf = elements.pdfFile.files?.[0];
    if (pdf) formData.append('pdf_file', pdf);

    return formData;
}

export function isGenerateResponse(value: unknown): value is GenerateResponse {
    if (typeof value !== 'object' || value === null || !('success' in value)) return false;
    if (value.success === true) return 'redirect' in value && typeof value.redirect === 'string';
    if (value.success === false) return 'error' in value && typeof value.error === 'string';
    return false;
}

export async function submitGeneration(
    formData: FormData,
    fetchImpl: typeof fetch = fetch,
    channel?: string
): Promise<GenerateResponse> {
    const url = channel ? `/generate?log_channel=${encodeURIComponent(channel)}` : '/generate';
    const res = await fetchImpl(url, { method: 'POST', body: formData });
    const data: unknown = await res.json();
    if (!isGenerateResponse(data)) {
        throw new Error(`Unexpected response from server (HTTP ${res.status})`);
    }
    return data;
}

export function appendLogEntry(logWindow: HTMLElement, msg: string, now: Date = new Date()): void {
    logWindow.hidden = false;
    const entry = logWindow.ownerDocument.createElement('div');
    entry.className = 'log-entry';
    entry.textContent = `[${now.toTimeString().slice(0, 8)}] ${msg}`;
    logWindow.appendChild(entry);
    logWindow.scrollTop = logWindow.scrollHeight;
}

export function parseLogEvent(data: string): LogEvent | null {
    try {
        const parsed: unknown = JSON.parse(data);
        if (typeof parsed === 'object' && parsed !== null && 'msg' in parsed && typeof parsed.msg === 'string') {
            return { msg: parsed.msg };
        }
    } catch {
        console.warn('[logs] Ignoring malformed log event');
    }
    return null;
}

export interface RandomSource {
    getRandomValues(array: Uint8Array): Uint8Array;
}

/**
 * 32 hex characters. Built from getRandomValues, which unlike randomUUID is also
 * available on plain-HTTP origins.
 */
export function createChannelId(random: RandomSource = crypto): string {
    const bytes = random.getRandomValues(new Uint8Array(16));
    return Array.from(bytes, byte => byte.toString(16).padStart(2, '0')).join('');
}

export function mountGenerationForm(win: Window & typeof globalThis = window): void {
    const elements = findFormElements(win.document);
    if (!elements) {
        console.error('[form] Generation form markup is missing');
        return;
    }

    const channel = createChannelId(win.crypto);
    const events = new win.EventSource(`/events?channel=${encodeURIComponent(channel)}`);
    events.addEventListener('log', (event: MessageEvent<string>) => {
        const logEvent = parseLogEvent(event.data);
        if (logEvent) appendLogEntry(elements.logWindow, logEvent.msg);
    });

    const resetButton = () => {
        elements.button.disabled = false;
        elements.button.textContent = GENERATE_LABEL;
    };

    elements.form.addEventListener('submit', async (event) => {
        event.preventDefault();

        const formData = buildGenerationFormData(elements, channel);
        if (!formData) {
            win.alert('Enter a topic');
            return;
        }

        elements.button.disabled = true;
        elements.button.textContent = 'Processing...';
        elements.logWindow.replaceChildren();
        elements.logWindow.hidden = false;

        try {
            const data = await submitGeneration(formData, win.fetch.bind(win), channel);
            if (data.success) {
                win.location.href = data.redirect;
                return;
            }
            win.alert(data.error);
        } catch (error) {
            console.error(error);
            win.alert('An error occurred. Please try again.');
        }
        resetButton();
    });
}
