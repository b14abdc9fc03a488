/**
 * Steps through the server-rendered `.slide` sections one at a time.
 */
export class SlideViewer {
    private current = 0;
    private readonly slides: HTMLElement[];

    constructor(root: ParentNode) {
        this.slides = Array.from(root.querySelectorAll<HTMLElement>('.slide'));
    }

    get index(): number {
        return this.current;
    }

    get total(): number {
        return this.slides.length;
    }

    show(index: number): void {
        if (this.slides.length === 0) return;
        this.current = Math.min(Math.max(index, 0), this.slides.length - 1);

        this.slides.forEach((slide, i) => {
            const isActive = i === this.current;
            slide.classList.toggle('active', isActive);

            const video = slide.querySelector('video');
            if (!video) return;
            if (isActive) {
                video.play().catch((error: unknown) => {
                    // Browsers may refuse autoplay; the poster frame stays visible
                    console.debug('[viewer] Video autoplay prevented:', error);
                });
            } else if (!video.paused) {
                video.pause();
            }
        });
    }

    next(): void {
        if (this.current < this.slides.length - 1) this.show(this.current + 1);
    }

    prev(): void {
        if (this.current > 0) this.show(this.current - 1);
    }

    handleKey(event: Pick<KeyboardEvent, 'key'>): void {
        if (event.key === 'ArrowRight') this.next();
        if (event.key === 'ArrowLeft') this.prev();
    }
}

export function mountViewer(doc: Document = document): SlideViewer {
    const viewer = new SlideViewer(doc);
    doc.addEventListener('keydown', (event) => viewer.handleKey(event));
    viewer.show(0);
    return viewer;
}
