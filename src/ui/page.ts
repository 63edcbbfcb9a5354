import { escapeHtml, nonce } from '../util/text';

import { UiState } from './presenter';
import { COMMAND_TEMPLATES } from './templates';

export const SECURITY_WARNING =
  'Commands run with your user privileges. The blocklist is incomplete and can be bypassed. ' +
  'Review every command before executing it.';

function embedJson(value: unknown): string {
  return JSON.stringify(value).replace(/</g, '\\u003c');
}

function renderTemplates(): string {
  return COMMAND_TEMPLATES.map(
    (group) => `
          <optgroup label="${escapeHtml(group.category)}">
            ${group.templates
              .map(
                (template) =>
                  `<option value="${escapeHtml(template.command)}">${escapeHtml(template.label)}</option>`
              )
              .join('')}
          </optgroup>`
  ).join('');
}

/**
 * Single-page UI; all actions go through POST /api/message, carrying the
 * session token in the X-Shellwright-Token header.
 */
export function renderPage(state: UiState, token: string): string {
  const nonceValue = nonce();
  const { config, modes } = state;
  return `<!DOCTYPE html>
<html lang="en">
  <head>
    <meta charset="UTF-8" />
    <meta http-equiv="Content-Security-Policy" content="default-src 'none'; style-src 'nonce-${nonceValue}'; script-src 'nonce-${nonceValue}'; connect-src 'self';" />
    <meta name="viewport" content="width=device-width, initial-scale=1.0" />
    <title>Shellwright</title>
    <style nonce="${nonceValue}">
      body { font-family: -apple-system, Segoe UI, sans-serif; margin: 0; padding: 24px; color: #0f172a; background: #f8fafc; }
      main { max-width: 960px; margin: 0 auto; display: grid; gap: 16px; }
      h1 { font-size: 22px; margin: 0; }
      section { background: white; border: 1px solid #e2e8f0; border-radius: 10px; padding: 16px; }
      .warning { background: #fef3c7; border-color: #f59e0b; color: #78350f; }
      .row { display: flex; gap: 8px; align-items: center; flex-wrap: wrap; }
      textarea, input, select { font: inherit; padding: 8px; border: 1px solid #cbd5e1; border-radius: 6px; }
      textarea { width: 100%; min-height: 72px; box-sizing: border-box; }
      #command { width: 100%; box-sizing: border-box; font-family: ui-monospace, Menlo, monospace; }
      button { background: #2563eb; color: white; border: none; padding: 8px 12px; border-radius: 6px; cursor: pointer; }
      button:hover { background: #1d4ed8; }
      button.secondary { background: #e2e8f0; color: #0f172a; }
      button.danger { background: #dc2626; }
      pre { background: #0f172a; color: #e2e8f0; padding: 12px; border-radius: 8px; overflow-x: auto; white-space: pre-wrap; margin: 0; }
      #status[data-level="success"] { color: #15803d; }
      #status[data-level="warning"] { color: #b45309; }
      #status[data-level="error"] { color: #b91c1c; }
      #risk[data-risk="high"] { color: #b91c1c; font-weight: 600; }
      .history-item { border-top: 1px solid #e2e8f0; padding: 8px 0; }
      .history-item .meta { color: #475569; font-size: 12px; }
      .badge { display: inline-block; padding: 0 6px; border-radius: 4px; font-size: 12px; background: #e2e8f0; }
      .badge.error { background: #fee2e2; }
      .badge.warning { background: #fef3c7; }
      .badge.success { background: #dcfce7; }
    </style>
  </head>
  <body>
    <main>
      <h1>Shellwright</h1>
      <section class="warning" id="security-warning">${escapeHtml(SECURITY_WARNING)}</section>

      <section>
        <div class="row">
          <label><input type="checkbox" id="dry-run" ${modes.dryRun ? 'checked' : ''} /> Dry run</label>
          <label><input type="checkbox" id="safe-mode" ${modes.safeMode ? 'checked' : ''} /> Safe mode (read-only)</label>
          <button class="secondary" id="refresh-status">Refresh status</button>
        </div>
        <pre id="system-status">${escapeHtml(state.systemStatus)}</pre>
      </section>

      <section>
        <label for="prompt">What do you want to do?</label>
        <textarea id="prompt" placeholder="e.g. list all files larger than 10MB in this folder"></textarea>
        <div class="row">
          <button id="generate">Generate</button>
          <button id="generate-execute" class="danger">Generate &amp; Execute</button>
          <button id="clear" class="secondary">Clear</button>
          <select id="templates">
            <option value="">Templates...</option>${renderTemplates()}
          </select>
        </div>
        <p><label for="command">Command (editable)</label> <span id="risk"></span></p>
        <input id="command" type="text" spellcheck="false" />
        <div class="row">
          <button id="execute" class="danger">Execute</button>
          <button id="copy" class="secondary">Copy</button>
        </div>
        <p id="status" data-level="info">Ready</p>
        <pre id="output"></pre>
        <pre id="note" hidden></pre>
      </section>

      <section>
        <h2>Configuration</h2>
        <div class="row">
          <label>Endpoint <input id="endpoint" type="url" value="${escapeHtml(config.endpoint)}" /></label>
          <label>Model <select id="model"><option value="${escapeHtml(config.model)}">${escapeHtml(config.model)}</option></select></label>
          <button id="refresh-models" class="secondary">Refresh models</button>
          <label>Timeout (s) <input id="timeout" type="number" min="5" max="300" value="${config.timeoutSeconds}" /></label>
        </div>
        <div class="row">
          <button id="apply-config">Apply</button>
          <button id="save-config" class="secondary">Save</button>
          <button id="reset-config" class="secondary">Reset to defaults</button>
        </div>
      </section>

      <section>
        <div class="row">
          <h2>History</h2>
          <button id="clear-history" class="secondary">Clear history</button>
        </div>
        <div id="history"></div>
      </section>
    </main>
    <script nonce="${nonceValue}">
      (function() {
        const initial = ${embedJson(state)};
        const token = ${embedJson(token)};
        const $ = (id) => document.getElementById(id);
        let suggested = '';
        let lastPrompt = '';

        function setStatus(level, message) {
          const el = $('status');
          el.dataset.level = level;
          el.textContent = message;
        }

        function renderHistory(entries) {
          const root = $('history');
          root.textContent = '';
          if (!entries.length) {
            root.textContent = 'No commands yet.';
            return;
          }
          for (const entry of entries) {
            const item = document.createElement('div');
            item.className = 'history-item';
            const meta = document.createElement('div');
            meta.className = 'meta';
            const badge = document.createElement('span');
            badge.className = 'badge ' + entry.status;
            badge.textContent = entry.status;
            meta.append(badge, ' ' + entry.time + '  ' + entry.prompt);
            const cmd = document.createElement('pre');
            cmd.textContent = '$ ' + entry.command;
            item.append(meta, cmd);
            if (entry.edit) {
              const edit = document.createElement('div');
              edit.className = 'meta';
              edit.textContent = 'edited: ' + entry.edit;
              item.append(edit);
            }
            const out = document.createElement('pre');
            out.textContent = entry.output;
            item.append(out);
            root.append(item);
          }
        }

        function renderModels(models, selected) {
          const select = $('model');
          select.textContent = '';
          const names = models.includes(selected) ? models : [selected].concat(models);
          for (const name of names) {
            const option = document.createElement('option');
            option.value = name;
            option.textContent = name;
            option.selected = name === selected;
            select.append(option);
          }
        }

        function apply(message) {
          switch (message.type) {
            case 'status': setStatus(message.level, message.message); break;
            case 'command':
              suggested = message.command;
              $('command').value = message.command;
              $('risk').dataset.risk = message.risk;
              $('risk').textContent = message.warning || ('Risk: ' + message.risk.toUpperCase());
              break;
            case 'output':
              $('output').textContent = message.output;
              $('note').hidden = !message.note;
              $('note').textContent = message.note || '';
              break;
            case 'history': renderHistory(message.entries); break;
            case 'modes':
              $('dry-run').checked = message.dryRun;
              $('safe-mode').checked = message.safeMode;
              break;
            case 'systemStatus': $('system-status').textContent = message.text; break;
            case 'models': renderModels(message.models, message.selected); break;
            case 'config':
              $('endpoint').value = message.config.endpoint;
              renderModels([], message.config.model);
              $('timeout').value = String(message.config.timeoutSeconds);
              break;
            case 'reset':
              suggested = '';
              $('prompt').value = '';
              $('command').value = '';
              $('output').textContent = '';
              $('note').hidden = true;
              $('risk').textContent = '';
              break;
          }
        }

        async function send(payload) {
          try {
            const res = await fetch('/api/message', {
              method: 'POST',
              headers: { 'Content-Type': 'application/json', 'X-Shellwright-Token': token },
              body: JSON.stringify(payload),
            });
            const messages = await res.json();
            if (Array.isArray(messages)) {
              messages.forEach(apply);
            }
          } catch (err) {
            setStatus('error', 'Server unreachable: ' + err);
          }
        }

        $('generate').addEventListener('click', () => {
          lastPrompt = $('prompt').value;
          setStatus('info', 'Generating...');
          send({ type: 'generate', prompt: lastPrompt });
        });
        $('generate-execute').addEventListener('click', () => {
          lastPrompt = $('prompt').value;
          setStatus('info', 'Generating and executing...');
          send({ type: 'generateAndExecute', prompt: lastPrompt });
        });
        $('execute').addEventListener('click', () => {
          setStatus('info', 'Executing...');
          send({ type: 'execute', command: $('command').value, prompt: lastPrompt, suggested: suggested || undefined });
        });
        $('clear').addEventListener('click', () => send({ type: 'clear' }));
        $('copy').addEventListener('click', async () => {
          try {
            await navigator.clipboard.writeText($('command').value);
            setStatus('success', 'Copied');
          } catch (err) {
            setStatus('error', 'Copy failed');
          }
        });
        $('templates').addEventListener('change', (event) => {
          const value = event.target.value;
          if (value) {
            suggested = '';
            $('command').value = value;
            event.target.value = '';
          }
        });
        $('dry-run').addEventListener('change', (event) => send({ type: 'setDryRun', enabled: event.target.checked }));
        $('safe-mode').addEventListener('change', (event) => send({ type: 'setSafeMode', enabled: event.target.checked }));
        $('refresh-status').addEventListener('click', () => send({ type: 'refreshStatus' }));
        $('refresh-models').addEventListener('click', () => send({ type: 'refreshModels' }));
        $('apply-config').addEventListener('click', () => send({
          type: 'updateConfig',
          config: {
            endpoint: $('endpoint').value,
            model: $('model').value,
            timeoutSeconds: Number($('timeout').value),
          },
        }));
        $('save-config').addEventListener('click', () => send({ type: 'saveConfig' }));
        $('reset-config').addEventListener('click', () => send({ type: 'resetConfig' }));
        $('clear-history').addEventListener('click', () => send({ type: 'clearHistory' }));

        renderHistory(initial.history);
        send({ type: 'refreshStatus' });
      })();
    </script>
  </body>
</html>`;
}
