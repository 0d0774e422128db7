import { TIMER_KIND_TABLE } from './timerKinds';
import { TIMER_KINDS } from './types';

function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

const CLIENT_SCRIPT = `
async function call(method, url, body) {
  const res = await fetch(url, {
    method,
    headers: body ? { 'Content-Type': 'application/json' } : {},
    body: body ? JSON.stringify(body) : undefined
  });
  const payload = await res.json().catch(() => ({}));
  document.getElementById('log').textContent = payload.data?.message ?? payload.message ?? '';
  await refresh();
}

async function refresh() {
  const res = await fetch('/api/status.json');
  if (!res.ok) return;
  const { data } = await res.json();
  for (const kind of Object.keys(data.timers)) {
    const timer = data.timers[kind];
    const el = document.getElementById(kind + '_state');
    if (!el) continue;
    el.textContent = timer && timer.status === 'scheduled'
      ? '⏳ ' + timer.due_at_local + ' (' + timer.remaining + ')'
      : (timer ? timer.status : '-');
  }
}

fetch('/api/tz', {
  method: 'POST',
  headers: { 'Content-Type': 'application/json' },
  body: JSON.stringify({ tz: Intl.DateTimeFormat().resolvedOptions().timeZone })
}).finally(refresh);
setInterval(refresh, 30000);
`;

function timerRow(kind: (typeof TIMER_KINDS)[number]): string {
  const label = escapeHtml(TIMER_KIND_TABLE[kind].label);
  return `<li>
      <strong>${label}</strong> <span id="${kind}_state">-</span>
      <button onclick="call('POST', '/api/timer/${kind}')">시작</button>
      <button onclick="call('POST', '/api/timer/${kind}/cancel')">정지</button>
    </li>`;
}

export function renderHomePage(params: { userId?: string }): string {
  const body = params.userId
    ? `<p>로그인: ${escapeHtml(params.userId)} · <a href="/logout">로그아웃</a></p>
    <p><a href="/out/invite" target="_blank" rel="noopener">봇 초대</a>
      <button onclick="call('POST', '/api/test-send')">테스트 DM</button></p>
    <ul>${TIMER_KINDS.map(timerRow).join('')}</ul>
    <pre id="log"></pre>
    <script>${CLIENT_SCRIPT}</script>`
    : '<p><a href="/auth/discord/login">디스코드로 로그인</a></p>';

  return `<!doctype html>
<html lang="ko">
  <head>
    <meta charset="utf-8" />
    <meta name="viewport" content="width=device-width, initial-scale=1" />
    <title>쿨타임 알림</title>
  </head>
  <body>
    <h1>쿨타임 알림</h1>
    ${body}
  </body>
</html>`;
}
