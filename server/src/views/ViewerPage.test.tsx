import { describe, expect, it } from 'vitest';
import { ViewerPage } from './ViewerPage';
import { IndexPage } from './IndexPage';
import { renderPage } from './render';
import type { Presentation, Slide } from '@shared/types';

const slide = (position: number, extra: Partial<Slide> = {}): Slide => ({
    position,
    title: `Title ${position}`,
    content: `Body ${position}`,
    imageUrl: `/static/uploads/img_${position}.png`,
    videoUrl: null,
    ...extra,
});

const deck = (slides: Slide[]): Presentation => ({
    id: 'deck-1',
    title: 'Mars colonization',
    ownerId: null,
    hasVideo: slides.some(s => s.videoUrl !== null),
    slides,
    createdAt: new Date('2026-01-01T00:00:00Z'),
});

const sectionsOf = (html: string) => html.split('<section').slice(1);

describe('ViewerPage', () => {
    it('renders one section per slide with only the first active', () => {
        const html = renderPage(<ViewerPage presentation={deck([slide(1), slide(2), slide(3)])} />);
        const sections = sectionsOf(html);

        expect(html.startsWith('<!DOCTYPE html><html lang="en">')).toBe(true);
        expect(sections).toHaveLength(3);
        expect(sections[0]).toContain(' class="slide active" id="slide-0" data-position="1"');
        expect(sections[1]).toContain(' class="slide" id="slide-1" data-position="2"');
        expect(sections[2]).toContain(' class="slide" id="slide-2" data-position="3"');
        expect(html).not.toContain('<video');
        expect(html).toContain('<script type="module" src="/static/js/viewer.js"></script>');
    });

    it('renders a video instead of the image on a video slide', () => {
        const html = renderPage(
            <ViewerPage presentation={deck([slide(1, { videoUrl: '/static/uploads/veo_1.mp4' }), slide(2)])} />
        );
        const [first, second] = sectionsOf(html);

        expect(first).toContain('<video class="slide-media" src="/static/uploads/veo_1.mp4" poster="/static/uploads/img_1.png"');
        expect(first).not.toContain('<img');
        expect(first).not.toContain('autoplay');
        expect(second).not.toContain('<video');
        expect(second).toContain('<img class="slide-media" src="/static/uploads/img_2.png" alt="Title 2"/>');
    });

    it('escapes model text', () => {
        const html = renderPage(<ViewerPage presentation={deck([slide(1, { title: '<b>Bold</b> & brave' })])} />);

        expect(html).toContain('<h2>&lt;b&gt;Bold&lt;/b&gt; &amp; brave</h2>');
    });

    it('renders slides without media as text only', () => {
        const html = renderPage(<ViewerPage presentation={deck([slide(1, { imageUrl: null })])} />);

        expect(html).not.toContain('<img');
        expect(html).toContain('<p>Body 1</p>');
    });
});

describe('IndexPage', () => {
    it('shows the guest quota', () => {
        const html = renderPage(<IndexPage guestUsage={4} guestLimit={15} />);

        expect(html).toContain('<p class="usage" id="guestUsage">4 / 15 guest generations used</p>');
        expect(html).toContain('<form id="generateForm" novalidate="">');
    });
});
