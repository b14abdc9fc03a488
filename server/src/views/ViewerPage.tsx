import React from 'react';
import type { Presentation, Slide } from '@shared/types';
import { Layout } from './Layout';

const SlideMedia: React.FC<{ slide: Slide }> = ({ slide }) => {
    if (slide.videoUrl) {
        // No autoplay: the client viewer starts playback when the slide becomes active
        return (
            <video
                className="slide-media"
                src={slide.videoUrl}
                poster={slide.imageUrl ?? undefined}
                muted
                loop
                playsInline
                preload="metadata"
            />
        );
    }
    if (slide.imageUrl) {
        return <img className="slide-media" src={slide.imageUrl} alt={slide.title} />;
    }
    return null;
};

export const ViewerPage: React.FC<{ presentation: Presentation }> = ({ presentation }) => (
    <Layout title={presentation.title} bodyClassName="viewer" scripts={['/static/js/viewer.js']}>
        <main className="deck" aria-label={presentation.title}>
            {presentation.slides.map((slide, index) => (
                <section
                    key={slide.position}
                    className={index === 0 ? 'slide active' : 'slide'}
                    id={`slide-${index}`}
                    data-position={slide.position}
                >
                    <SlideMedia slide={slide} />
                    <div className="slide-text">
                        <h2>{slide.title}</h2>
                        <p>{slide.content}</p>
                    </div>
                </section>
            ))}
        </main>
        <footer className="viewer-hint">
            <a href="/">New deck</a>
            <span>Use ← and → to navigate</span>
        </footer>
    </Layout>
);
