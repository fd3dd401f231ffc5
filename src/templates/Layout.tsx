import type { PropsWithChildren } from "react";

export default function Layout({
  title,
  children,
  scripts = [],
}: PropsWithChildren<{ title: string; scripts?: string[] }>) {
  return (
    <html lang="en">
      <head>
        <meta charSet="utf-8" />
        <meta name="viewport" content="width=device-width, initial-scale=1" />
        <title>{title}</title>
        <link rel="stylesheet" href="/static/styles.css" />
      </head>
      <body>
        <main className="container">{children}</main>
        {scripts.map((src) => (
          <script key={src} src={src} defer />
        ))}
      </body>
    </html>
  );
}
