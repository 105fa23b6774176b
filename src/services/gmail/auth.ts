// Gmail OAuth 2.0 authentication and credential management
import { google } from 'googleapis';
import type { OAuth2Client } from 'google-auth-library';
import { readFileSync, writeFileSync, existsSync } from 'fs';
import http from 'http';
import { URL } from 'url';
import open from 'open';
import { z } from 'zod';
import { AuthenticationError, describeError } from '../../lib/errors.js';

export const SCOPES = ['https://www.googleapis.com/auth/gmail.readonly'];
const REDIRECT_PORT = 3001;
const REDIRECT_URI = `http://localhost:${REDIRECT_PORT}`;
const CONSENT_TIMEOUT_MS = 5 * 60 * 1000;

const ClientKeysSchema = z.object({
  client_id: z.string(),
  client_secret: z.string(),
  redirect_uris: z.array(z.string()).optional(),
});

const GoogleCredentialsSchema = z.object({
  installed: ClientKeysSchema.optional(),
  web: ClientKeysSchema.optional(),
});

export type GoogleCredentials = z.infer<typeof GoogleCredentialsSchema>;

const TokenDataSchema = z.object({
  access_token: z.string(),
  refresh_token: z.string().optional(),
  scope: z.string(),
  token_type: z.string(),
  expiry_date: z.number(),
});

export type TokenData = z.infer<typeof TokenDataSchema>;

/**
 * Load the OAuth client secret downloaded from Google Cloud Console
 */
export function loadCredentials(credentialsPath: string): GoogleCredentials {
  if (!existsSync(credentialsPath)) {
    throw new AuthenticationError(
      `Credentials file '${credentialsPath}' not found. Download it from Google Cloud Console.`
    );
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(credentialsPath, 'utf-8'));
  } catch (error) {
    throw new AuthenticationError(
      `Credentials file '${credentialsPath}' is not valid JSON: ${describeError(error)}`,
      { cause: error }
    );
  }

  const result = GoogleCredentialsSchema.safeParse(raw);
  if (!result.success) {
    throw new AuthenticationError(`Credentials file '${credentialsPath}' has an unexpected format`);
  }
  return result.data;
}

/**
 * Load token from file if it exists
 */
export function loadToken(tokenPath: string): TokenData | null {
  if (!existsSync(tokenPath)) {
    return null;
  }

  try {
    return TokenDataSchema.parse(JSON.parse(readFileSync(tokenPath, 'utf-8')));
  } catch (error) {
    console.warn(`Failed to load token from ${tokenPath}:`, describeError(error));
    return null;
  }
}

/**
 * Save token to file
 */
export function saveToken(tokenPath: string, token: TokenData): void {
  writeFileSync(tokenPath, JSON.stringify(token, null, 2));
  console.log(`✓ Token saved to ${tokenPath}`);
}

/**
 * Create OAuth2 client from credentials
 */
export function createOAuth2Client(credentials: GoogleCredentials): OAuth2Client {
  const keys = credentials.installed || credentials.web;
  if (!keys) {
    throw new AuthenticationError('Invalid credentials format: missing installed or web keys');
  }

  return new google.auth.OAuth2(keys.client_id, keys.client_secret, REDIRECT_URI);
}

/**
 * Run browser-based OAuth consent flow
 * Opens browser, starts local server to receive callback, returns authorization code
 */
export async function runConsentFlow(oauth2Client: OAuth2Client): Promise<string> {
  const authUrl = oauth2Client.generateAuthUrl({
    access_type: 'offline',
    scope: SCOPES,
    prompt: 'consent', // Force consent to get refresh token
  });

  console.log('\n📧 Gmail Authorization Required');
  console.log('Opening browser for consent...');
  console.log('If browser does not open, visit this URL:');
  console.log(authUrl);
  console.log();

  try {
    await open(authUrl);
  } catch (error) {
    console.warn('Could not open a browser:', describeError(error));
  }

  return new Promise((resolve, reject) => {
    const timer = setTimeout(() => {
      server.close();
      reject(new AuthenticationError('OAuth consent flow timed out after 5 minutes'));
    }, CONSENT_TIMEOUT_MS);

    const finish = (outcome: () => void) => {
      clearTimeout(timer);
      server.close();
      outcome();
    };

    const server = http.createServer((req, res) => {
      if (!req.url) {
        return;
      }

      const url = new URL(req.url, REDIRECT_URI);
      const code = url.searchParams.get('code');
      const error = url.searchParams.get('error');

      if (error) {
        res.writeHead(400, { 'Content-Type': 'text/html' });
        res.end(`<h1>Authorization Failed</h1><p>Error: ${error}</p>`);
        finish(() => reject(new AuthenticationError(`OAuth error: ${error}`)));
        return;
      }

      if (code) {
        res.writeHead(200, { 'Content-Type': 'text/html' });
        res.end(`
          <h1>Authorization Successful!</h1>
          <p>You can close this window and return to the terminal.</p>
        `);
        finish(() => resolve(code));
        return;
      }

      res.writeHead(404);
      res.end('Not found');
    });

    server.on('error', (err) => finish(() => reject(new AuthenticationError(
      `Could not listen for the OAuth callback: ${err.message}`,
      { cause: err }
    ))));

    server.listen(REDIRECT_PORT, () => {
      console.log(`Listening for OAuth callback on ${REDIRECT_URI}...`);
    });
  });
}

/**
 * Exchange authorization code for tokens
 */
export async function exchangeCodeForTokens(
  oauth2Client: OAuth2Client,
  code: string
): Promise<TokenData> {
  const { tokens } = await oauth2Client.getToken(code);

  if (!tokens.access_token) {
    throw new AuthenticationError('No access token received from Google');
  }

  return {
    access_token: tokens.access_token,
    refresh_token: tokens.refresh_token ?? undefined,
    scope: tokens.scope || SCOPES.join(' '),
    token_type: tokens.token_type || 'Bearer',
    expiry_date: tokens.expiry_date || Date.now() + 3600 * 1000,
  };
}

/**
 * Check if token is expired or about to expire (within 5 minutes)
 */
export function isTokenExpired(token: TokenData, now = Date.now()): boolean {
  const buffer = 5 * 60 * 1000; // 5 minutes

  return now + buffer >= token.expiry_date;
}

/**
 * Refresh access token using refresh token
 */
export async function refreshAccessToken(
  oauth2Client: OAuth2Client,
  token: TokenData
): Promise<TokenData> {
  if (!token.refresh_token) {
    throw new AuthenticationError('No refresh token available - need to re-authorize');
  }

  oauth2Client.setCredentials({
    refresh_token: token.refresh_token,
  });

  const { credentials } = await oauth2Client.refreshAccessToken();

  if (!credentials.access_token) {
    throw new AuthenticationError('Token refresh returned no access token');
  }

  return {
    access_token: credentials.access_token,
    refresh_token: token.refresh_token, // Keep original refresh token
    scope: credentials.scope || token.scope,
    token_type: credentials.token_type || 'Bearer',
    expiry_date: credentials.expiry_date || Date.now() + 3600 * 1000,
  };
}

export interface AuthOptions {
  credentialsPath: string;
  tokenPath: string;
  /** When false, a missing or unrefreshable token fails instead of opening a browser */
  interactive?: boolean;
}

async function obtainTokenByConsent(
  oauth2Client: OAuth2Client,
  options: AuthOptions
): Promise<TokenData> {
  if (options.interactive === false) {
    throw new AuthenticationError(
      `No usable token in '${options.tokenPath}' and interactive consent is disabled`
    );
  }
  const code = await runConsentFlow(oauth2Client);
  return exchangeCodeForTokens(oauth2Client, code);
}

/**
 * Get authenticated OAuth2 client with valid token
 * Handles token loading, expiry checking, refresh, and consent flow
 */
export async function getAuthenticatedClient(options: AuthOptions): Promise<OAuth2Client> {
  const credentials = loadCredentials(options.credentialsPath);
  const oauth2Client = createOAuth2Client(credentials);

  let token = loadToken(options.tokenPath);

  // If no token exists, run consent flow
  if (!token) {
    console.log('No token found, starting OAuth consent flow...');
    token = await obtainTokenByConsent(oauth2Client, options);
    saveToken(options.tokenPath, token);
  }

  // If token is expired, refresh it once
  if (isTokenExpired(token)) {
    console.log('Token expired, refreshing...');
    try {
      token = await refreshAccessToken(oauth2Client, token);
      console.log('✓ Token refreshed');
    } catch (error) {
      console.error('Failed to refresh token:', describeError(error));
      token = await obtainTokenByConsent(oauth2Client, options);
    }
    saveToken(options.tokenPath, token);
  }

  oauth2Client.setCredentials(token);

  return oauth2Client;
}
