const HTML_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;",
};

export const escapeHtml = (value: string | number) =>
  String(value).replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);

const NAV_LINKS = [
  { href: "/home", label: "Home" },
  { href: "/smash", label: "Smash Ranks" },
  { href: "/smash/report", label: "Report a Match" },
  { href: "/smash/players/new", label: "Add Player" },
  { href: "/gallery", label: "Gallery" },
];

export function layout(title: string, body: string): string {
  const nav = NAV_LINKS.map((link) => `<a href="${link.href}">${escapeHtml(link.label)}</a>`).join("\n      ");

  return `<!DOCTYPE html>
<html lang="en">
  <head>
    <meta charset="utf-8">
    <meta name="viewport" content="width=device-width, initial-scale=1">
    <title>${escapeHtml(title)}</title>
    <style>
      body { background: #121212; color: #eee; font-family: system-ui, sans-serif; margin: 0 auto; max-width: 960px; padding: 1rem; }
      nav a { color: #90caf9; margin-right: 1rem; }
      table { border-collapse: collapse; width: 100%; }
      th, td { border-bottom: 1px solid #333; padding: 0.4rem; text-align: left; }
      .error { color: #ef9a9a; }
      video { max-width: 100%; }
    </style>
  </head>
  <body>
    <nav>
      ${nav}
    </nav>
    <main>
${body}
    </main>
  </body>
</html>
`;
}
