import { ConfigurationError, RemoteServiceError, errorMessage } from "../errors";
import { Logger } from "../utils/logger";

const logger = Logger.create("SpotifyAuth");

/**
 * Hands out bearer tokens for the Web API. Session and credential handling live
 * behind this seam; the catalog code never creates or refreshes them itself.
 */
export interface AccessTokenProvider {
  getAccessToken(): Promise<string>;
}

export class StaticTokenProvider implements AccessTokenProvider {
  constructor(private readonly token: string) {
    if (!token) throw new ConfigurationError("Access token must not be empty");
  }

  getAccessToken(): Promise<string> {
    return Promise.resolve(this.token);
  }
}

interface TokenResponse {
  access_token: string;
  token_type: string;
  expires_in: number;
}

function isTokenResponse(value: unknown): value is TokenResponse {
  return (
    typeof value === "object" && value !== null &&
    "access_token" in value && typeof value.access_token === "string" &&
    "expires_in" in value && typeof value.expires_in === "number"
  );
}

interface CachedToken {
  accessToken: string;
  expiresAt: number;
}

// refresh a minute early so a token never expires mid-request
const EXPIRY_MARGIN_MS = 60 * 1000;

export class ClientCredentialsAuth implements AccessTokenProvider {
  readonly tokenUrl: string = "https://accounts.spotify.com/api/token";
  private token: CachedToken | null = null;
  private pending: Promise<string> | null = null;

  constructor(
    private readonly clientId: string,
    private readonly clientSecret: string,
    private readonly now: () => number = Date.now
  ) { }

  async getAccessToken(): Promise<string> {
    if (this.token && this.now() < this.token.expiresAt - EXPIRY_MARGIN_MS) {
      return this.token.accessToken;
    }

    // concurrent callers share one token request
    if (!this.pending) {
      this.pending = this.requestToken().finally(() => {
        this.pending = null;
      });
    }
    return this.pending;
  }

  private async requestToken(): Promise<string> {
    const credentials = Buffer.from(`${this.clientId}:${this.clientSecret}`).toString("base64");

    let response: Response;
    try {
      response = await fetch(this.tokenUrl, {
        method: "POST",
        headers: {
          "Authorization": `Basic ${credentials}`,
          "Content-Type": "application/x-www-form-urlencoded",
        },
        body: "grant_type=client_credentials",
      });
    } catch (networkError) {
      logger.logError(`Token request failed: ${errorMessage(networkError)}`);
      throw new RemoteServiceError(`Network error while requesting access token: ${errorMessage(networkError)}`, undefined, { cause: networkError });
    }

    if (!response.ok) {
      const errorText = await response.text().catch(() => "");
      throw new RemoteServiceError(`Spotify auth failed: ${response.status} ${response.statusText} ${errorText.substring(0, 200)}`.trim(), response.status);
    }

    let data: unknown;
    try {
      data = await response.json();
    } catch (parseError) {
      throw new RemoteServiceError(`Malformed token response: ${errorMessage(parseError)}`, response.status, { cause: parseError });
    }

    if (!isTokenResponse(data)) {
      throw new RemoteServiceError("Malformed token response: missing access_token or expires_in", response.status);
    }

    this.token = {
      accessToken: data.access_token,
      expiresAt: this.now() + data.expires_in * 1000,
    };
    logger.logInfo(`Client credentials token obtained, expires in ${data.expires_in}s`);

    return this.token.accessToken;
  }
}
