import fsp from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { OAuth2Client } from "google-auth-library";
import { authorize, parseClientSecrets } from "../drive-auth.js";
import { waitFor } from "./util.js";

const SECRETS = JSON.stringify({
  installed: {
    client_id: "test-client.apps.example.com",
    client_secret: "test-secret",
    redirect_uris: ["http://localhost"],
  },
});

describe("parseClientSecrets", () => {
  test("reads a desktop client", () => {
    expect(parseClientSecrets(SECRETS)).toEqual({
      clientId: "test-client.apps.example.com",
      clientSecret: "test-secret",
    });
  });

  test("reads a web client", () => {
    const raw = JSON.stringify({
      web: { client_id: "web-id", client_secret: "web-secret" },
    });
    expect(parseClientSecrets(raw)).toEqual({
      clientId: "web-id",
      clientSecret: "web-secret",
    });
  });

  test("rejects other JSON", () => {
    expect(() => parseClientSecrets("{}", "creds.json")).toThrow(
      /^creds\.json does not contain an OAuth client/,
    );
    expect(() => parseClientSecrets("not json", "creds.json")).toThrow(
      /^creds\.json is not valid JSON/,
    );
  });
});

describe("authorize", () => {
  let tmp: string;

  beforeAll(async () => {
    tmp = await fsp.mkdtemp(path.join(os.tmpdir(), "drive-catalog-auth-"));
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  afterAll(async () => {
    await fsp.rm(tmp, { recursive: true, force: true });
  });

  async function writeCredentials(name: string): Promise<string> {
    const credentialsPath = path.join(tmp, name);
    await fsp.writeFile(credentialsPath, SECRETS);
    return credentialsPath;
  }

  function consentRedirect(authUrl: string): string {
    const redirect = new URL(authUrl).searchParams.get("redirect_uri");
    if (!redirect) throw new Error(`no redirect_uri in ${authUrl}`);
    return redirect;
  }

  test("writes refreshed tokens back to the token file", async () => {
    const credentialsPath = await writeCredentials("refresh-credentials.json");
    const tokenPath = path.join(tmp, "refresh-token.json");
    await fsp.writeFile(
      tokenPath,
      JSON.stringify({ refresh_token: "test-refresh", access_token: "stale" }),
    );
    const client = await authorize({ credentialsPath, tokenPath });
    client.emit("tokens", { access_token: "fresh", expiry_date: 1700000000000 });
    const saved = await waitFor(
      () => fsp.readFile(tokenPath, "utf8"),
      (text) => text.trimEnd().endsWith("}") && text.includes('"fresh"'),
    );
    expect(JSON.parse(saved)).toEqual({
      refresh_token: "test-refresh",
      access_token: "fresh",
      expiry_date: 1700000000000,
    });
  });

  test("runs the loopback consent flow when no token is cached", async () => {
    const credentialsPath = await writeCredentials("consent-credentials.json");
    const tokenPath = path.join(tmp, "consent", "token.json");
    const getToken = jest
      .spyOn(OAuth2Client.prototype, "getToken")
      .mockImplementation(async () => ({
        tokens: { refresh_token: "test-refresh", access_token: "test-access" },
        res: null,
      }));
    const replies: Promise<string>[] = [];
    const urls: string[] = [];
    const client = await authorize({
      credentialsPath,
      tokenPath,
      prompt: (authUrl) => {
        urls.push(authUrl);
        replies.push(
          fetch(`${consentRedirect(authUrl)}/?code=test-code`).then((r) => r.text()),
        );
      },
    });

    expect(await Promise.all(replies)).toEqual([
      "Authorization complete. You can close this window.",
    ]);
    const params = new URL(urls[0]).searchParams;
    expect(params.get("client_id")).toBe("test-client.apps.example.com");
    expect(params.get("access_type")).toBe("offline");
    expect(params.get("scope")).toBe(
      "https://www.googleapis.com/auth/drive.readonly",
    );
    expect(consentRedirect(urls[0])).toMatch(/^http:\/\/127\.0\.0\.1:\d+$/);
    expect(getToken).toHaveBeenCalledWith({
      code: "test-code",
      redirect_uri: consentRedirect(urls[0]),
    });
    expect(client.credentials).toEqual({
      refresh_token: "test-refresh",
      access_token: "test-access",
    });
    expect(JSON.parse(await fsp.readFile(tokenPath, "utf8"))).toEqual({
      refresh_token: "test-refresh",
      access_token: "test-access",
    });
    expect((await fsp.stat(tokenPath)).mode & 0o777).toBe(0o600);
  });

  test("a denied consent rejects without requesting a token", async () => {
    const credentialsPath = await writeCredentials("denied-credentials.json");
    const tokenPath = path.join(tmp, "denied-token.json");
    const getToken = jest.spyOn(OAuth2Client.prototype, "getToken");
    const replies: Promise<string>[] = [];
    await expect(
      authorize({
        credentialsPath,
        tokenPath,
        prompt: (authUrl) => {
          replies.push(
            fetch(`${consentRedirect(authUrl)}/?error=access_denied`).then((r) =>
              r.text(),
            ),
          );
        },
      }),
    ).rejects.toThrow("authorization denied: access_denied");
    expect(await Promise.all(replies)).toEqual(["Authorization was denied."]);
    expect(getToken).not.toHaveBeenCalled();
    await expect(fsp.access(tokenPath)).rejects.toMatchObject({ code: "ENOENT" });
  });

  test("reuses a cached token without prompting", async () => {
    const credentialsPath = path.join(tmp, "credentials.json");
    const tokenPath = path.join(tmp, "token.json");
    await fsp.writeFile(credentialsPath, SECRETS);
    await fsp.writeFile(
      tokenPath,
      JSON.stringify({ refresh_token: "test-refresh", access_token: "test-access" }),
    );
    const prompt = jest.fn();
    const client = await authorize({ credentialsPath, tokenPath, prompt });
    expect(prompt).not.toHaveBeenCalled();
    expect(client.credentials).toEqual({
      refresh_token: "test-refresh",
      access_token: "test-access",
    });
  });

  test("fails when the credentials file is missing", async () => {
    await expect(
      authorize({
        credentialsPath: path.join(tmp, "absent.json"),
        tokenPath: path.join(tmp, "absent-token.json"),
      }),
    ).rejects.toMatchObject({ code: "ENOENT" });
  });
});
