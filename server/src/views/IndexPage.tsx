import React from 'react';
import { DEFAULT_NUM_SLIDES, MAX_NUM_SLIDES, MIN_NUM_SLIDES } from '@shared/constants';
import { Layout } from './Layout';

interface IndexPageProps {
    guestUsage: number;
    guestLimit: number;
}

export const IndexPage: React.FC<IndexPageProps> = ({ guestUsage, guestLimit }) => (
    <Layout title="SlideReel" bodyClassName="home" scripts={['/static/js/main.js']}>
        <main className="panel">
            <h1>SlideReel</h1>
            <p className="tagline">Type a topic. Get a cinematic deck.</p>

            <form id="generateForm" noValidate>
                <label htmlFor="topic">Topic</label>
                <input id="topic" name="topic" type="text" placeholder="e.g. Mars colonization" required />

                <label htmlFor="slides">Slides</label>
                <input
                    id="slides"
                    name="slide_count"
                    type="number"
                    min={MIN_NUM_SLIDES}
                    max={MAX_NUM_SLIDES}
                    defaultValue={DEFAULT_NUM_SLIDES}
                />

                <label htmlFor="url_link">Context URL (optional)</label>
                <input id="url_link" name="url_link" type="url" placeholder="https://" />

                <label htmlFor="pdf_file">Source PDF (optional)</label>
                <input id="pdf_file" name="pdf_file" type="file" accept="application/pdf" />

                <label className="checkbox">
                    <input id="enableVideo" name="enable_video" type="checkbox" />
                    Animate the first slide with video
                </label>

                <button type="submit" className="btn-primary">Generate</button>
            </form>

            <p className="usage" id="guestUsage">
                {guestUsage} / {guestLimit} guest generations used
            </p>

            <div id="logWindow" className="log-window" hidden></div>
        </main>
    </Layout>
);
