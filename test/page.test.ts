import { describe, expect, it } from 'vitest';

import { renderPage, SECURITY_WARNING } from '../src/ui/page';
import { UiState } from '../src/ui/presenter';

import { TEST_CONFIG } from './support/fakes';

function state(overrides: Partial<UiState> = {}): UiState {
  return {
    modes: { dryRun: false, safeMode: false },
    config: TEST_CONFIG,
    history: [],
    systemStatus: 'Checking model server...',
    platform: 'linux',
    ...overrides,
  };
}

describe('renderPage', () => {
  it('shows the security warning and the configuration', () => {
    const html = renderPage(state(), 'test-token');
    expect(html).toContain(`<section class="warning" id="security-warning">${SECURITY_WARNING}</section>`);
    expect(html).toContain('<input id="endpoint" type="url" value="http://localhost:11434" />');
    expect(html).toContain('<option value="gemma3:4b">gemma3:4b</option>');
    expect(html).toContain('value="30"');
  });

  it('uses the same nonce for the policy, styles and script', () => {
    const html = renderPage(state(), 'test-token');
    const match = /script-src 'nonce-([A-Za-z0-9]{16})'/.exec(html);
    expect(match).not.toBeNull();
    const value = match ? match[1] : '';
    expect(html).toContain(`<style nonce="${value}">`);
    expect(html).toContain(`<script nonce="${value}">`);
  });

  it('reflects the active modes', () => {
    const html = renderPage(state({ modes: { dryRun: true, safeMode: false } }), 'test-token');
    expect(html).toContain('<input type="checkbox" id="dry-run" checked />');
    expect(html).toContain('<input type="checkbox" id="safe-mode"  />');
  });

  it('escapes user-controlled values', () => {
    const html = renderPage(
      state({
        config: { ...TEST_CONFIG, model: '"><script>alert(1)</script>' },
        systemStatus: '<b>offline</b>',
        history: [
          {
            id: 1,
            time: '10:00:00',
            prompt: '</script><script>alert(2)</script>',
            command: 'ls',
            status: 'success',
            output: '',
            exitCode: 0,
            durationMs: 3,
            edit: null,
          },
        ],
      }),
      'test-token'
    );
    expect(html).toContain('<pre id="system-status">&lt;b&gt;offline&lt;/b&gt;</pre>');
    expect(html).toContain('&quot;&gt;&lt;script&gt;alert(1)&lt;/script&gt;');
    expect(html).not.toContain('</script><script>alert(2)');
    expect(html).toContain('\\u003c/script>\\u003cscript>alert(2)\\u003c/script>');
  });

  it('lists command templates by category', () => {
    const html = renderPage(state(), 'test-token');
    expect(html).toContain('<optgroup label="System Info">');
    expect(html).toContain('<option value="df -h">Disk usage</option>');
    expect(html).toContain(`<option value="find . -name &#39;*.ts&#39;">Find TypeScript files</option>`);
  });

  it('embeds the session token and sends it with every message', () => {
    const html = renderPage(state(), 'test-token');
    expect(html).toContain('const token = "test-token";');
    expect(html).toContain("headers: { 'Content-Type': 'application/json', 'X-Shellwright-Token': token },");
  });
});
