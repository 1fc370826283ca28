// OAuth for the Drive store: a desktop ("installed") client, a cached token
// file, and a loopback consent flow when no token is cached yet.
import { createServer, type Server } from "node:http";
import { mkdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import { OAuth2Client, type Credentials } from "google-auth-library";
import { DRIVE_READONLY_SCOPE } from "./constants.js";
import { errorMessage } from "./errors.js";
import { NullLogger, type Logger } from "./logger.js";

export type ClientSecrets = {
  clientId: string;
  clientSecret: string;
};

export type AuthorizeOptions = {
  credentialsPath: string;
  tokenPath: string;
  logger?: Logger;
  // called with the consent URL; defaults to printing it on stderr
  prompt?: (authUrl: string) => void;
};

function stringField(obj: object, key: string): string | undefined {
  const value: unknown = Object.getOwnPropertyDescriptor(obj, key)?.value;
  return typeof value === "string" && value ? value : undefined;
}

export function parseClientSecrets(raw: string, source = "credentials"): ClientSecrets {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new Error(`${source} is not valid JSON: ${errorMessage(err)}`);
  }
  if (typeof parsed === "object" && parsed !== null) {
    for (const key of ["installed", "web"]) {
      const section: unknown = Object.getOwnPropertyDescriptor(parsed, key)?.value;
      if (typeof section !== "object" || section === null) continue;
      const clientId = stringField(section, "client_id");
      const clientSecret = stringField(section, "client_secret");
      if (clientId && clientSecret) {
        return { clientId, clientSecret };
      }
    }
  }
  throw new Error(
    `${source} does not contain an OAuth client (expected "installed" or "web" with client_id and client_secret)`,
  );
}

async function readToken(tokenPath: string): Promise<Credentials | undefined> {
  let raw: string;
  try {
    raw = await readFile(tokenPath, "utf8");
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      return undefined;
    }
    throw err;
  }
  const parsed: unknown = JSON.parse(raw);
  if (typeof parsed !== "object" || parsed === null) return undefined;
  const token: Credentials = {};
  const refresh = stringField(parsed, "refresh_token");
  const access = stringField(parsed, "access_token");
  const expiry: unknown = Object.getOwnPropertyDescriptor(parsed, "expiry_date")?.value;
  if (refresh) token.refresh_token = refresh;
  if (access) token.access_token = access;
  if (typeof expiry === "number") token.expiry_date = expiry;
  return refresh || access ? token : undefined;
}

async function saveToken(tokenPath: string, token: Credentials): Promise<void> {
  await mkdir(path.dirname(path.resolve(tokenPath)), { recursive: true });
  await writeFile(tokenPath, JSON.stringify(token, null, 2), { mode: 0o600 });
}

function listen(server: Server): Promise<number> {
  return new Promise((resolve, reject) => {
    server.once("error", reject);
    server.listen(0, "127.0.0.1", () => {
      const address = server.address();
      if (address && typeof address === "object") {
        resolve(address.port);
      } else {
        reject(new Error("loopback server has no port"));
      }
    });
  });
}

function waitForCode(server: Server): Promise<string> {
  return new Promise((resolve, reject) => {
    server.on("request", (req, res) => {
      const url = new URL(req.url ?? "/", "http://127.0.0.1");
      const code = url.searchParams.get("code");
      const denied = url.searchParams.get("error");
      if (code) {
        res.end("Authorization complete. You can close this window.");
        resolve(code);
      } else if (denied) {
        res.end("Authorization was denied.");
        reject(new Error(`authorization denied: ${denied}`));
      } else {
        res.statusCode = 404;
        res.end();
      }
    });
  });
}

async function runConsentFlow(
  secrets: ClientSecrets,
  prompt: (authUrl: string) => void,
): Promise<{ client: OAuth2Client; tokens: Credentials }> {
  const server = createServer();
  try {
    const port = await listen(server);
    const codeReceived = waitForCode(server);
    const redirectUri = `http://127.0.0.1:${port}`;
    const client = new OAuth2Client(
      secrets.clientId,
      secrets.clientSecret,
      redirectUri,
    );
    prompt(
      client.generateAuthUrl({
        access_type: "offline",
        scope: [DRIVE_READONLY_SCOPE],
        prompt: "consent",
      }),
    );
    const code = await codeReceived;
    const { tokens } = await client.getToken({ code, redirect_uri: redirectUri });
    return { client, tokens };
  } finally {
    server.close();
  }
}

const defaultPrompt = (authUrl: string) => {
  console.error(`Open this URL in a browser to authorize read-only Drive access:\n\n  ${authUrl}\n`);
};

/**
 * Produce an authorized OAuth2 client. Tokens refreshed by the client while
 * it runs are written back to `tokenPath`.
 */
export async function authorize(opts: AuthorizeOptions): Promise<OAuth2Client> {
  const logger = opts.logger ?? new NullLogger();
  const secrets = parseClientSecrets(
    await readFile(opts.credentialsPath, "utf8"),
    opts.credentialsPath,
  );

  let client: OAuth2Client;
  let token = await readToken(opts.tokenPath);
  if (token) {
    logger.debug("using cached token", { tokenPath: opts.tokenPath });
    client = new OAuth2Client(secrets.clientId, secrets.clientSecret);
    client.setCredentials(token);
  } else {
    ({ client, tokens: token } = await runConsentFlow(
      secrets,
      opts.prompt ?? defaultPrompt,
    ));
    client.setCredentials(token);
    await saveToken(opts.tokenPath, token);
    logger.info("saved token", { tokenPath: opts.tokenPath });
  }

  let current: Credentials = token;
  client.on("tokens", (fresh) => {
    current = { ...current, ...fresh };
    saveToken(opts.tokenPath, current).catch((err) => {
      logger.warn("failed to save refreshed token", {
        tokenPath: opts.tokenPath,
        error: errorMessage(err),
      });
    });
  });
  return client;
}
