import type { ReactNode } from 'react';

const STYLES = `
body { font-family: system-ui, sans-serif; background: #f8fafc; color: #0f172a; margin: 0; }
main { max-width: 720px; margin: 0 auto; padding: 24px 16px 48px; }
.page-header h1 { font-size: 1.75rem; margin: 16px 0 8px; }
.page-header__subtitle { color: #475569; margin: 0 0 16px; }
.card { background: #fff; border: 1px solid #e2e8f0; border-radius: 16px; padding: 20px; margin-bottom: 16px; }
.card__title { font-size: 1rem; margin: 0 0 12px; }
.field { display: block; margin-bottom: 12px; }
.field input, .field select { display: block; width: 100%; padding: 8px; margin-top: 4px; box-sizing: border-box; }
.options { list-style: none; padding: 0; margin: 0 0 12px; }
.button { display: inline-block; border: 0; border-radius: 12px; padding: 10px 16px; font-weight: 600; cursor: pointer; text-decoration: none; }
.button--primary { background: #4f46e5; color: #fff; }
.button--secondary { background: #fff; color: #334155; border: 1px solid #e2e8f0; }
.timer { position: sticky; top: 0; background: #f1f5f9; border: 1px solid #e2e8f0; border-radius: 8px; padding: 8px 12px; margin-bottom: 16px; }
.score { font-size: 2rem; font-weight: 700; }
`;

interface LayoutProps {
  title: string;
  children: ReactNode;
}

export default function Layout({ title, children }: LayoutProps) {
  return (
    <html lang="ru">
      <head>
        <meta charSet="utf-8" />
        <meta name="viewport" content="width=device-width, initial-scale=1" />
        <title>{title}</title>
        <style dangerouslySetInnerHTML={{ __html: STYLES }} />
      </head>
      <body>
        <main>{children}</main>
      </body>
    </html>
  );
}
