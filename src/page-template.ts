export type FragmentElement = "pre" | "article";

export interface PageOptions {
  /** Already-escaped title markup. */
  title: string;
  element: FragmentElement;
  /** Fragment markup; the client replaces it on every update. */
  body: string;
}

/**
 * Builds the preview page. The fragment element's opening and closing tags
 * sit on lines of their own so the server can cut the fragment back out of
 * the rendered file.
 */
export function buildPageHtml(options: PageOptions): string {
  const body = options.body.endsWith("\n") ? options.body : `${options.body}\n`;
  return `<!DOCTYPE html>
<html>
<head>
<meta charset="UTF-8">
<meta name="viewport" content="width=device-width, initial-scale=1">
<title>${options.title}</title>
<style type="text/css">
  :root {
    color-scheme: light dark;
  }

  body {
    margin: 0;
    padding: 2rem 1.5rem 4rem;
    text-align: center;
  }

  #manpage {
    display: inline-block;
    text-align: left;
    font-family: "SFMono-Regular", "Consolas", "Liberation Mono", monospace;
  }

  article#manpage {
    max-width: 860px;
    font-family: -apple-system, BlinkMacSystemFont, "Segoe UI", system-ui, sans-serif;
    line-height: 1.6;
  }

  article#manpage pre {
    padding: 0.75rem 1rem;
    overflow-x: auto;
    border: 1px solid #d0d7de;
    border-radius: 0.5rem;
  }
</style>
</head>
<body>
<${options.element} id="manpage">
${body}</${options.element}>
<script>
(function () {
  var source = new EventSource('/events')
  source.addEventListener('update', function (event) {
    document.getElementById('manpage').innerHTML = JSON.parse(event.data).content
  })
  source.addEventListener('bye', function () {
    source.close()
  })
})()
</script>
</body>
</html>
`;
}

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}
