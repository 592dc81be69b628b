import fs from "fs";
import https from "https";
import fetch from "node-fetch";
import * as ntlm from "ntlm-client";
import type { PortalCredentials } from "./types";
import { decodeBody, delay, randomInt } from "./utils";

export interface PortalResponse {
  status: number;
  url: string;
  text: string;
}

// One credentialed connection to the portal
export interface PortalSession {
  get(url: string): Promise<PortalResponse>;
  close(): void;
}

export type SessionFactory = (credentials: PortalCredentials) => PortalSession;

// Anything that can turn a URL into page text; the crawl stages only need this much
export interface PageSource {
  fetchText(url: string): Promise<string | null>;
}

export type FetchOutcome =
  | { kind: "ok"; response: PortalResponse }
  | { kind: "failed"; status: number }
  | { kind: "exhausted"; status: number };

/**
 * Re-authentication allowance shared by every fetch of one crawl session.
 * Once more than `limit` retries have been spent the budget reports exhaustion
 * and starts over from zero.
 */
export class RetryBudget {
  private used = 0;

  constructor(readonly limit = 5) {}

  get spent(): number {
    return this.used;
  }

  consume(): boolean {
    this.used += 1;
    if (this.used > this.limit) {
      this.used = 0;
      return false;
    }
    return true;
  }
}

function splitUsername(username: string): { domain: string; user: string } {
  const idx = username.indexOf("\\");
  return idx === -1 ? { domain: "", user: username } : { domain: username.slice(0, idx), user: username.slice(idx + 1) };
}

/**
 * NTLM needs the Type1 and Type3 requests on the same socket, hence the
 * single-socket keep-alive agent per session.
 */
export function createNtlmSessionFactory(certificatePath: string | null): SessionFactory {
  const ca = certificatePath ? fs.readFileSync(certificatePath) : undefined;

  return (credentials) => {
    const agent = new https.Agent({ keepAlive: true, maxSockets: 1, ca });
    const { domain, user } = splitUsername(credentials.username);

    const request = async (url: string, authorization: string): Promise<PortalResponse & { challenge: string | null }> => {
      const res = await fetch(url, {
        agent: url.startsWith("https:") ? agent : undefined,
        headers: { Authorization: authorization, Connection: "keep-alive" },
        redirect: "follow",
      });
      const buffer = await res.buffer();
      const header = res.headers.get("www-authenticate");
      return {
        status: res.status,
        url: res.url,
        text: decodeBody(buffer, res.headers.get("content-type")),
        challenge: header && /^NTLM\s+\S+/i.test(header) ? header : null,
      };
    };

    return {
      async get(url) {
        const negotiate = await request(url, ntlm.createType1Message("", domain));
        if (negotiate.status !== 401 || !negotiate.challenge) {
          return { status: negotiate.status, url: negotiate.url, text: negotiate.text };
        }
        const type2 = ntlm.decodeType2Message(negotiate.challenge);
        const final = await request(url, ntlm.createType3Message(type2, user, credentials.password, "", domain));
        return { status: final.status, url: final.url, text: final.text };
      },
      close() {
        agent.destroy();
      },
    };
  };
}

export class PortalFetcher implements PageSource {
  private session: PortalSession;

  constructor(
    private readonly credentials: PortalCredentials,
    private readonly budget: RetryBudget,
    private readonly createSession: SessionFactory
  ) {
    this.session = createSession(credentials);
  }

  async fetch(url: string): Promise<FetchOutcome> {
    for (;;) {
      const response = await this.session.get(url);
      if (response.status === 200) {
        console.log(`Page ${url} status: 200 - successful`);
        return { kind: "ok", response };
      }

      console.warn(`Page ${url} status: ${response.status} - denied.`);
      if (response.status !== 401) {
        return { kind: "failed", status: response.status };
      }
      if (!this.budget.consume()) {
        console.warn(`Giving up on ${url}: retry budget of ${this.budget.limit} spent`);
        return { kind: "exhausted", status: response.status };
      }
      console.log("Trying to reconnect...");
      this.session.close();
      this.session = this.createSession(this.credentials);
    }
  }

  async fetchText(url: string): Promise<string | null> {
    const outcome = await this.fetch(url);
    return outcome.kind === "ok" ? outcome.response.text : null;
  }
}

export type Pause = () => Promise<void>;

// Politeness delay between sequential page fetches
export function createPause([minMs, maxMs]: [number, number]): Pause {
  return () => delay(randomInt(minMs, maxMs));
}

export const noPause: Pause = async () => {};
