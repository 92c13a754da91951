// --- HTML pages ---
// Every page shares one layout that pulls in /static/style.css.

const ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#x27;",
};

// Anything user-controlled must pass through here before it goes into HTML
export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (ch) => ESCAPES[ch] ?? ch);
}

function layout(title: string, content: string): string {
  return `<!doctype html>
<html lang="en">
<head>
  <meta charset="UTF-8" />
  <meta name="viewport" content="width=device-width, initial-scale=1.0" />
  <title>${escapeHtml(title)}</title>
  <link rel="stylesheet" href="/static/style.css" />
</head>
<body>
  <main class="container">
${content}
  </main>
</body>
</html>
`;
}

export function homePage(): string {
  return layout(
    "Short URL - Free URL Shortener",
    `    <h1>Short URL</h1>
    <p class="subtitle">Paste your long link to make it shorter in seconds.</p>
    <form method="post" action="/" class="card">
      <label for="url">Enter your long URL</label>
      <input id="url" name="url" type="text" placeholder="https://example.com/very/long/link" required />
      <button type="submit">Shorten URL</button>
    </form>`,
  );
}

export function resultPage(originalUrl: string, shortUrl: string): string {
  const href = escapeHtml(shortUrl);
  return layout(
    "Your Short URL",
    `    <h1>Done! Your short URL is ready</h1>
    <div class="card result">
      <p><strong>Original:</strong> ${escapeHtml(originalUrl)}</p>
      <p><strong>Short:</strong> <a href="${href}">${href}</a></p>
      <a class="btn" href="/">Create another</a>
    </div>`,
  );
}

export function invalidUrlPage(): string {
  return layout(
    "Short URL - URL Error",
    `    <h1>Oops! Invalid URL</h1>
    <div class="card error">
      <p>Your submitted link is not a valid HTTP or HTTPS URL.</p>
      <p>Please double-check and try again.</p>
      <a class="btn" href="/">Go Back</a>
    </div>`,
  );
}

export function statsPage(total: number): string {
  return layout(
    "Short URL - Stats",
    `    <h1>Stats</h1>
    <div class="card">
      <p><strong>Total short URLs:</strong> <span class="total">${total}</span></p>
      <a class="btn" href="/">Create a new short URL</a>
    </div>`,
  );
}

export function notFoundPage(): string {
  return layout(
    "Not Found",
    `    <h1>Link Not Found</h1>
    <div class="card error">
      <p>This short URL does not exist.</p>
      <a class="btn" href="/">Create a new short URL</a>
    </div>`,
  );
}

export function serverErrorPage(): string {
  return layout(
    "Something Went Wrong",
    `    <h1>Something went wrong</h1>
    <div class="card error">
      <p>We could not complete your request. Please try again later.</p>
      <a class="btn" href="/">Go Back</a>
    </div>`,
  );
}
