/**
 * Interactive Setup
 *
 * First-run flow for obtaining a long-lived refresh token: asks for the app
 * key and secret when they were not supplied, sends the user to the Dropbox
 * authorization page, exchanges the code they paste back, and saves the
 * resulting credentials.
 */

import { spawn } from 'child_process';
import { input, password } from '@inquirer/prompts';
import { Credentials } from '../../shared/types';
import { AuthError } from './errors';
import { authorizationUrl, exchangeAuthorizationCode, AuthorizationTokens } from './dropboxAuth';
import { saveCredentials } from './credentialsStore';
import type { LogSink } from './logger';

export interface SetupInput {
  appKey?: string;
  appSecret?: string;
  credentialsPath: string;
}

/** Collaborators, replaceable in tests */
export interface SetupDeps {
  askText?: (message: string) => Promise<string>;
  askSecret?: (message: string) => Promise<string>;
  openUrl?: (url: string) => Promise<boolean>;
  exchange?: (appKey: string, appSecret: string, code: string) => Promise<AuthorizationTokens>;
  save?: (filePath: string, credentials: Credentials) => Promise<void>;
  /** Where instructions are printed. Defaults to process.stderr */
  output?: LogSink;
}

function askText(message: string): Promise<string> {
  return input({ message });
}

function askSecret(message: string): Promise<string> {
  return password({ message, mask: '*' });
}

/**
 * Opens a URL in the default browser. Resolves false when no opener could be
 * started; the URL is printed either way.
 */
export function openInBrowser(url: string): Promise<boolean> {
  const command =
    process.platform === 'darwin' ? 'open' : process.platform === 'win32' ? 'explorer' : 'xdg-open';

  return new Promise<boolean>((resolve) => {
    const child = spawn(command, [url], { stdio: 'ignore', detached: true });
    child.once('error', () => resolve(false));
    child.once('spawn', () => {
      child.unref();
      resolve(true);
    });
  });
}

/**
 * Runs the setup flow and returns the saved credentials.
 *
 * @throws AuthError if the app key, secret or code is empty, or the exchange fails
 * @throws WriteError if the credentials cannot be saved
 */
export async function runInteractiveSetup(
  setupInput: SetupInput,
  deps: SetupDeps = {},
): Promise<Credentials> {
  const ask = deps.askText ?? askText;
  const askHidden = deps.askSecret ?? askSecret;
  const open = deps.openUrl ?? openInBrowser;
  const exchange = deps.exchange ?? exchangeAuthorizationCode;
  const save = deps.save ?? saveCredentials;
  const out = deps.output ?? process.stderr;

  out.write('Dropbox setup: create an app at https://www.dropbox.com/developers/apps\n');
  out.write('(scoped access, files.metadata.read and account_info.read permissions).\n\n');

  const appKey = setupInput.appKey?.trim() || (await ask('App key:')).trim();
  if (!appKey) throw new AuthError('App key is required');

  const appSecret = setupInput.appSecret?.trim() || (await askHidden('App secret:')).trim();
  if (!appSecret) throw new AuthError('App secret is required');

  const url = authorizationUrl(appKey);
  out.write(`Open this URL to authorize the app:\n  ${url}\n\n`);
  if (!(await open(url))) {
    out.write('Could not open a browser; copy the URL above.\n');
  }

  const code = (await ask('Authorization code:')).trim();
  if (!code) throw new AuthError('Authorization code is required');

  const tokens = await exchange(appKey, appSecret, code);
  const credentials: Credentials = { appKey, appSecret, refreshToken: tokens.refreshToken };
  await save(setupInput.credentialsPath, credentials);

  out.write(`Credentials saved to ${setupInput.credentialsPath}\n`);
  return credentials;
}
