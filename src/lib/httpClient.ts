import axios, { AxiosInstance } from 'axios';

// Client HTTP avec timeout dur par requête

export interface HttpClientResponse<T = unknown> {
  status: number;
  data: T;
  ok: boolean;
}

export interface JsonHttpClient {
  getJSON(url: string, timeoutMs?: number): Promise<HttpClientResponse>;
  postJSON(url: string, body: unknown, timeoutMs?: number): Promise<HttpClientResponse>;
}

export class HttpClient implements JsonHttpClient {
  private readonly http: AxiosInstance;

  constructor(
    private readonly defaultTimeoutMs: number = 10000,
    userAgent: string = 'ListingWatch/1.0'
  ) {
    this.http = axios.create({
      headers: {
        'Accept': 'application/json',
        'User-Agent': userAgent
      },
      // Le statut est remonté à l'appelant au lieu d'être levé
      validateStatus: () => true
    });
  }

  async getJSON(url: string, timeoutMs?: number): Promise<HttpClientResponse> {
    const timeout = timeoutMs ?? this.defaultTimeoutMs;
    try {
      const response = await this.http.get<unknown>(url, { timeout });
      return this.toResponse(response.status, response.data);
    } catch (error) {
      throw this.describe(error, timeout);
    }
  }

  async postJSON(url: string, body: unknown, timeoutMs?: number): Promise<HttpClientResponse> {
    const timeout = timeoutMs ?? this.defaultTimeoutMs;
    try {
      const response = await this.http.post<unknown>(url, body, {
        timeout,
        headers: { 'Content-Type': 'application/json' }
      });
      return this.toResponse(response.status, response.data);
    } catch (error) {
      throw this.describe(error, timeout);
    }
  }

  private toResponse(status: number, data: unknown): HttpClientResponse {
    return {
      status,
      data,
      ok: status >= 200 && status < 300
    };
  }

  private describe(error: unknown, timeout: number): Error {
    if (axios.isAxiosError(error)) {
      if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
        return new Error(`Request timeout after ${timeout}ms`, { cause: error });
      }
      return new Error(`HTTP request failed: ${error.message}`, { cause: error });
    }
    return error instanceof Error ? error : new Error(String(error));
  }
}
