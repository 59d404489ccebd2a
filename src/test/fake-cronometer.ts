/**
 * In-process stand-in for the Cronometer endpoints (msw request handlers).
 * Records every request it sees so tests can assert on the handshake.
 */

import { http, HttpResponse, type HttpHandler } from 'msw';
import { CRONOMETER_URLS, type ExportType } from '../cronometer/types/index.js';

export const TEST_CSRF = 'test-csrf-token';
export const TEST_SESSION_COOKIE = 'JSESSIONID=test-session';
export const TEST_NONCE = 'test-nonce';
export const TEST_USER_ID = '12345';
export const TEST_TOKEN = 'test-export-token';

export const LOGIN_PAGE_HTML = `<!DOCTYPE html>
<html>
  <body>
    <form id="login-form" action="/login" method="post">
      <input type="hidden" name="anticsrf" value="${TEST_CSRF}" />
      <input type="email" name="username" />
      <input type="password" name="password" />
    </form>
  </body>
</html>`;

export interface FakeCronometerOptions {
  loginPage?: string;
  loginPageStatus?: number;
  loginResponse?: Record<string, string | boolean>;
  /** Raw login response body, sent instead of `loginResponse` */
  loginResponseText?: string;
  loginStatus?: number;
  authenticateResponse?: string;
  authenticateStatus?: number;
  /** Set the sesnonce cookie on the authenticate response (default: true) */
  setNonce?: boolean;
  /** Token responses, served in order; the last one repeats */
  tokenResponses?: string[];
  tokenStatus?: number;
  logoutStatus?: number;
  exports?: Partial<Record<ExportType, string>>;
  exportStatus?: number;
}

export interface GwtCall {
  method: string;
  body: string;
  headers: Headers;
}

export interface FakeCronometerCalls {
  loginPage: number;
  login: Array<{ form: URLSearchParams; cookie: string | null }>;
  gwt: GwtCall[];
  exports: URL[];
}

function gwtMethod(body: string): string {
  // 7|0|n|module|header|service|method|...
  return body.split('|')[6] ?? '';
}

export function createFakeCronometer(options: FakeCronometerOptions = {}): {
  handlers: HttpHandler[];
  calls: FakeCronometerCalls;
} {
  const calls: FakeCronometerCalls = { loginPage: 0, login: [], gwt: [], exports: [] };
  const tokenResponses = options.tokenResponses ?? [`//OK[1,["${TEST_TOKEN}"],0,7]`];
  let tokenIndex = 0;

  const handlers = [
    http.get(CRONOMETER_URLS.LOGIN_PAGE, () => {
      calls.loginPage++;
      return HttpResponse.html(options.loginPage ?? LOGIN_PAGE_HTML, {
        status: options.loginPageStatus ?? 200,
        headers: { 'Set-Cookie': `${TEST_SESSION_COOKIE}; Path=/` }
      });
    }),

    http.post(CRONOMETER_URLS.LOGIN, async ({ request }) => {
      calls.login.push({
        form: new URLSearchParams(await request.text()),
        cookie: request.headers.get('cookie')
      });
      const status = options.loginStatus ?? 200;
      if (options.loginResponseText !== undefined) {
        return HttpResponse.text(options.loginResponseText, { status });
      }
      return HttpResponse.json(options.loginResponse ?? { success: true }, { status });
    }),

    http.post(CRONOMETER_URLS.GWT_APP, async ({ request }) => {
      const body = await request.text();
      const method = gwtMethod(body);
      calls.gwt.push({ method, body, headers: request.headers });

      if (method === 'authenticate') {
        const setNonce = options.setNonce ?? true;
        return HttpResponse.text(options.authenticateResponse ?? `//OK[${TEST_USER_ID},2,1,["x"],0,7]`, {
          status: options.authenticateStatus ?? 200,
          headers: setNonce ? { 'Set-Cookie': `sesnonce=${TEST_NONCE}; Path=/` } : undefined
        });
      }

      if (method === 'generateAuthorizationToken') {
        const text = tokenResponses[Math.min(tokenIndex, tokenResponses.length - 1)] ?? '';
        tokenIndex++;
        return HttpResponse.text(text, { status: options.tokenStatus ?? 200 });
      }

      if (method === 'logout') {
        return HttpResponse.text('//OK[[],0,7]', { status: options.logoutStatus ?? 200 });
      }

      return HttpResponse.text('//EX[unknown method]', { status: 500 });
    }),

    http.get(CRONOMETER_URLS.EXPORT, ({ request }) => {
      const url = new URL(request.url);
      calls.exports.push(url);

      const status = options.exportStatus ?? 200;
      if (status !== 200) {
        return HttpResponse.text('Export not available', { status });
      }

      const type = url.searchParams.get('generate');
      const csv = Object.entries(options.exports ?? {}).find(([key]) => key === type)?.[1];
      return HttpResponse.text(csv ?? 'Day\n', { status });
    })
  ];

  return { handlers, calls };
}
