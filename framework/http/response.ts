/**
 * Enhanced Response Builder
 *
 * Provides a fluent interface for building HTTP responses
 * with common utilities for JSON, binary downloads and empty bodies.
 */

export interface ResponseOptions {
  status?: number;
  headers?: Headers | Record<string, string>;
}

/**
 * Response builder
 */
export class AppResponse {
  private _status: number = 200;
  private _headers: Headers = new Headers();
  private _body: string | Uint8Array | null = null;

  constructor(options?: ResponseOptions) {
    if (options?.status) {
      this._status = options.status;
    }
    if (options?.headers) {
      new Headers(options.headers).forEach((value, key) => {
        this._headers.set(key, value);
      });
    }
  }

  /**
   * Set the response status code
   */
  status(code: number): this {
    this._status = code;
    return this;
  }

  /**
   * Set a response header
   */
  header(name: string, value: string): this {
    this._headers.set(name, value);
    return this;
  }

  /**
   * Set multiple headers
   */
  headers(headers: Record<string, string>): this {
    for (const [name, value] of Object.entries(headers)) {
      this._headers.set(name, value);
    }
    return this;
  }

  /**
   * Set the Content-Type header
   */
  type(contentType: string): this {
    this._headers.set('Content-Type', contentType);
    return this;
  }

  /**
   * Send a JSON response
   */
  json(data: unknown): Response {
    this._headers.set('Content-Type', 'application/json; charset=utf-8');
    this._body = JSON.stringify(data);
    return this.build();
  }

  /**
   * Send a plain text response
   */
  text(content: string): Response {
    this._headers.set('Content-Type', 'text/plain; charset=utf-8');
    this._body = content;
    return this.build();
  }

  /**
   * Send a binary file as a download
   */
  attachment(data: Uint8Array, filename: string, contentType = 'application/octet-stream'): Response {
    this._headers.set('Content-Type', contentType);
    this._headers.set('Content-Disposition', `attachment; filename=${filename}`);
    this._headers.set('Content-Length', String(data.byteLength));
    this._body = data;
    return this.build();
  }

  /**
   * Send a 204 No Content response
   */
  noContent(): Response {
    this._status = 204;
    this._body = null;
    return this.build();
  }

  /**
   * Build the final Response object
   */
  build(): Response {
    return new Response(this._body, {
      status: this._status,
      headers: this._headers,
    });
  }
}

/**
 * Copy a response with extra headers applied
 */
export function withHeaders(response: Response, headers: Headers | Record<string, string>): Response {
  const merged = new Headers(response.headers);
  new Headers(headers).forEach((value, key) => {
    merged.set(key, value);
  });

  return new Response(response.body, {
    status: response.status,
    statusText: response.statusText,
    headers: merged,
  });
}
