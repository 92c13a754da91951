import express, { Express, NextFunction, Request, Response } from "express";
import morgan from "morgan";
import { CodeSpaceExhaustedError } from "./errors";
import { normalizeUrl } from "./normalize";
import {
  homePage,
  invalidUrlPage,
  notFoundPage,
  resultPage,
  serverErrorPage,
  statsPage,
} from "./pages";
import type { Shortener } from "./shortener";

export interface AppOptions {
  shortener: Shortener;
  // Folder served under /static (holds style.css)
  staticDir: string;
}

// Used for the short link when the request carries no Host header
const FALLBACK_HOST = "localhost:5000";

// The form field arrives as a string, or as an array if it was sent twice
function formField(body: unknown, name: string): string {
  if (typeof body !== "object" || body === null) {
    return "";
  }
  const value: unknown = Reflect.get(body, name);
  if (Array.isArray(value)) {
    return typeof value[0] === "string" ? value[0] : "";
  }
  return typeof value === "string" ? value : "";
}

// Express and body-parser put the HTTP status on the error as `status` (or
// `statusCode`). Returns it when it is a 4xx, otherwise undefined.
function clientErrorStatus(err: unknown): number | undefined {
  if (typeof err !== "object" || err === null) {
    return undefined;
  }
  const status: unknown = Reflect.get(err, "status") ?? Reflect.get(err, "statusCode");
  if (typeof status === "number" && status >= 400 && status < 500) {
    return status;
  }
  return undefined;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function createApp({ shortener, staticDir }: AppOptions): Express {
  const app = express();
  // Don't advertise the framework in every response
  app.disable("x-powered-by");

  if (process.env.NODE_ENV !== "test") {
    app.use(morgan("dev"));
  }

  // GET /static/style.css. express.static picks the Content-Type from the file
  // extension (text/css) and calls next() for files that don't exist, so
  // unknown /static/... paths still end up on the 404 page.
  app.use("/static", express.static(staticDir, { index: false }));

  // GET / — the submission form
  app.get("/", (_req: Request, res: Response) => {
    res.status(200).type("html").send(homePage());
  });

  // POST / — shorten the submitted `url` form field.
  // express.urlencoded() parses the browser's form body into req.body; it is
  // attached to this route only because no other route reads a body.
  app.post(
    "/",
    express.urlencoded({ extended: false }),
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        // "" means the input was rejected: bounce to the error page (302)
        const original = normalizeUrl(formField(req.body, "url"));
        if (!original) {
          res.redirect(302, "/url-error.php");
          return;
        }

        // Same URL twice gives the same code; see Shortener.shorten
        const code = await shortener.shorten(original);
        // Build the link from how the client reached us (scheme + Host header)
        const shortUrl = `${req.protocol}://${req.get("host") ?? FALLBACK_HOST}/${code}`;
        res.status(200).type("html").send(resultPage(original, shortUrl));
      } catch (err) {
        // Express 4 doesn't catch rejected promises, so hand errors over explicitly
        next(err);
      }
    },
  );

  app.get("/url-error.php", (_req: Request, res: Response) => {
    res.status(400).type("html").send(invalidUrlPage());
  });

  app.get("/stats", (_req: Request, res: Response) => {
    res.status(200).type("html").send(statsPage(shortener.count()));
  });

  // GET /:code — the redirect. Registered after every fixed path since
  // ":code" matches any single path segment.
  app.get("/:code", async (req: Request, res: Response, next: NextFunction) => {
    try {
      // resolve() also counts the click
      const target = await shortener.resolve(req.params.code);
      if (target === null) {
        // Not ours: fall through to the 404 handler below
        next();
        return;
      }
      // 302 (not 301) so browsers come back to us and every visit is counted
      res.redirect(302, target);
    } catch (err) {
      next(err);
    }
  });

  // Anything left over, including unknown codes
  app.use((_req: Request, res: Response) => {
    res.status(404).type("html").send(notFoundPage());
  });

  // Express recognizes error handlers by their four parameters.
  // Errors raised by Express itself (an undecodable "/%zz" path, a body that
  // is too large or malformed) carry a 4xx status; those are the client's
  // fault and keep their status instead of becoming a 500.
  app.use((err: unknown, req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(err);
      return;
    }

    const status = clientErrorStatus(err);
    if (status !== undefined) {
      console.warn(`Rejected ${req.method} ${req.originalUrl} with ${status}:`, errorMessage(err));
      // A GET for a path that can't even be decoded can't name a short code
      if (req.method === "GET" || req.method === "HEAD") {
        res.status(404).type("html").send(notFoundPage());
      } else {
        res.status(status).type("html").send(invalidUrlPage());
      }
      return;
    }

    console.error(`Error handling ${req.method} ${req.originalUrl}:`, err);
    // Running out of codes is a capacity problem: tell the client to retry later
    const serverStatus = err instanceof CodeSpaceExhaustedError ? 503 : 500;
    res.status(serverStatus).type("html").send(serverErrorPage());
  });

  return app;
}
