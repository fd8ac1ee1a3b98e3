import axios from 'axios';
import type { AxiosAdapter, AxiosInstance } from 'axios';
import { logger } from '../utils/logger';
import type { BackendClient, BackendResponse, ChallengeBackend } from '../types/remote';

export interface CloudApiOptions {
  apiUrl: string;
  accessToken: string;
  adapter?: AxiosAdapter;
}

export class CloudApiService implements BackendClient, ChallengeBackend {
  private http: AxiosInstance;

  constructor(options: CloudApiOptions) {
    this.http = axios.create({
      baseURL: options.apiUrl,
      headers: { authorization: options.accessToken },
      // Status handling belongs to the caller
      validateStatus: () => true,
      adapter: options.adapter
    });
  }

  public registerInstance(): Promise<BackendResponse> {
    return this.post('/register_instance');
  }

  public requestSessionToken(key: Buffer, iv: Buffer): Promise<BackendResponse> {
    return this.post('/snitun_token', {
      aes_key: key.toString('hex'),
      aes_iv: iv.toString('hex')
    });
  }

  public setChallengeTxt(txt: string): Promise<BackendResponse> {
    return this.post('/challenge_txt', { txt });
  }

  private async post(path: string, data?: Record<string, string>): Promise<BackendResponse> {
    const response = await this.http.post<unknown>(path, data);
    logger.debug(`Cloud API ${path} answered ${response.status}`);
    return { status: response.status, body: response.data };
  }
}
