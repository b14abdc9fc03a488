import React from 'react';

interface LayoutProps {
    title: string;
    bodyClassName?: string;
    scripts?: string[];
    children: React.ReactNode;
}

export const Layout: React.FC<LayoutProps> = ({ title, bodyClassName, scripts = [], children }) => (
    <html lang="en">
        <head>
            <meta charSet="utf-8" />
            <meta name="viewport" content="width=device-width, initial-scale=1" />
            <title>{title}</title>
            <link rel="stylesheet" href="/static/css/app.css" />
        </head>
        <body className={bodyClassName}>
            {children}
            {scripts.map(src => (
                <script key={src} type="module" src={src}></script>
            ))}
        </body>
    </html>
);
