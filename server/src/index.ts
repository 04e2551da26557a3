import { createApp } from './app.js';
import { loadServerConfig } from './navigation/config.js';
import { PushedNavigationSource, WorkspaceEditorHost } from './navigation/hosts.js';
import { NavigationHistory } from './navigationHistory.js';

const config = await loadServerConfig();

const source = new PushedNavigationSource();
const host = new WorkspaceEditorHost(config.workspaceRoot);
const history = new NavigationHistory({
  source,
  host,
  config: config.panel,
  workspaceRoot: config.workspaceRoot,
});

const app = createApp({ history, source, host });

app.listen(config.port, () => {
  // eslint-disable-next-line no-console
  console.log(`Navigation panel bridge listening on http://localhost:${config.port}`);
});
