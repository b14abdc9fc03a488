import type { ReactElement } from 'react';
import { renderToStaticMarkup } from 'react-dom/server';

export const renderPage = (element: ReactElement): string =>
    `<!DOCTYPE html>${renderToStaticMarkup(element)}`;
