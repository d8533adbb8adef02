import { fetch, ProxyAgent } from 'undici';
import type { ProxyDescriptor } from '../pipeline/types.js';

export interface TransportRequest {
  headers: Record<string, string>;
  signal: AbortSignal;
  proxy?: ProxyDescriptor;
}

export interface TransportResponse {
  status: number;
  headers: { get(name: string): string | null };
  text(): Promise<string>;
}

export type Transport = (url: string, request: TransportRequest) => Promise<TransportResponse>;

const proxyAgents = new Map<string, ProxyAgent>();

function getProxyAgent(proxy: ProxyDescriptor): ProxyAgent {
  const key = `${proxy.server}|${proxy.username ?? ''}`;
  const existing = proxyAgents.get(key);
  if (existing) {
    return existing;
  }

  const token = proxy.username
    ? `Basic ${Buffer.from(`${proxy.username}:${proxy.password ?? ''}`).toString('base64')}`
    : undefined;
  const agent = new ProxyAgent({ uri: proxy.server, token });
  proxyAgents.set(key, agent);
  return agent;
}

// Redirects are surfaced, not followed: a hop to the login page means the session expired
export const httpTransport: Transport = async (url, request) => {
  return fetch(url, {
    headers: request.headers,
    signal: request.signal,
    redirect: 'manual',
    dispatcher: request.proxy ? getProxyAgent(request.proxy) : undefined,
  });
};

export function parseRetryAfter(retryAfter: string | null, now: number = Date.now()): number | undefined {
  if (!retryAfter) return undefined;
  const seconds = Number(retryAfter);
  if (!Number.isNaN(seconds) && seconds >= 0) {
    return seconds * 1000;
  }
  const parsedDate = Date.parse(retryAfter);
  if (!Number.isNaN(parsedDate)) {
    return Math.max(0, parsedDate - now);
  }
  return undefined;
}

export async function closeProxyAgents(): Promise<void> {
  const agents = Array.from(proxyAgents.values());
  proxyAgents.clear();
  await Promise.all(agents.map(agent => agent.close()));
}
