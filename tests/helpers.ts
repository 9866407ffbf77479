import axios, { AxiosError, type AxiosInstance, type AxiosResponse, type InternalAxiosRequestConfig } from 'axios';

export interface StubReply {
  status: number;
  data?: unknown;
}

export type StubHandler = (config: InternalAxiosRequestConfig) => StubReply;

// axios instance whose requests never leave the process
export function stubHttp(handler: StubHandler): { http: AxiosInstance; calls: InternalAxiosRequestConfig[] } {
  const calls: InternalAxiosRequestConfig[] = [];
  const http = axios.create({
    adapter: async (config: InternalAxiosRequestConfig): Promise<AxiosResponse> => {
      calls.push(config);
      const reply = handler(config);
      return {
        data: reply.data ?? '',
        status: reply.status,
        statusText: String(reply.status),
        headers: {},
        config
      };
    }
  });
  return { http, calls };
}

export function refuseConnection(config: InternalAxiosRequestConfig): never {
  throw new AxiosError('connect ECONNREFUSED 127.0.0.1:443', 'ECONNREFUSED', config);
}

export function envelope(content: string): string {
  return JSON.stringify({
    id: 'cmpl-test',
    model: 'sonar-pro',
    choices: [{ index: 0, message: { role: 'assistant', content } }]
  });
}

export function requestBody(config: InternalAxiosRequestConfig): unknown {
  return JSON.parse(String(config.data));
}
