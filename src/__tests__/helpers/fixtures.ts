/**
 * Test Fixtures
 * Reusable test data
 */

export const SITE = 'https://docs.example.com';

const FILLER =
  '<p>This page documents part of the example toolkit and carries enough body text to count as a real page.</p>';

/**
 * A documentation page with its links in a nav bar
 */
export function docPage(heading: string, body: string = '', links: readonly string[] = []): string {
  const anchors = links.map((href) => `<a href="${href}">${href}</a>`).join('\n');
  return `<!DOCTYPE html>
<html>
<head><title>${heading}</title></head>
<body>
<nav>${anchors}</nav>
<main>
<h1>${heading}</h1>
${body}
${FILLER}
</main>
</body>
</html>`;
}

export const guideHtml = `<!DOCTYPE html>
<html>
<head>
  <title>Toolkit Guide</title>
  <script>window.analytics = true;</script>
  <style>body { color: black; }</style>
</head>
<body>
  <header><a href="/">Home</a></header>
  <nav class="top-nav"><a href="/guide">Guide</a></nav>
  <div class="sidebar">Sidebar links</div>
  <main>
    <h1>Toolkit Guide</h1>
    <p>The toolkit ships several packages.</p>
    <ul>
      <li>Fast builds</li>
      <li>Small bundles</li>
    </ul>
    <table>
      <tr><th>Name</th><th>Purpose</th></tr>
      <tr><td>core</td><td>Runtime</td></tr>
    </table>
  </main>
  <footer>Copyright 2024 Example</footer>
</body>
</html>`;

export const markdownDoc = `# Toolkit

Overview of the toolkit.

## Installation

Install the package with your package manager. It works on every platform.

### Requirements

A recent runtime is required.

## Configuration

Configuration lives in one file. Every option has a default.

- Output directory
- Cache location

## Deployment

Deploy the built files to any static host. Nothing else is needed.
`;
