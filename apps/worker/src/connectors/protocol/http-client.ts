import type { AxiosInstance } from 'axios';

/** The slice of axios the connectors use; tests pass a stub. */
export type HttpClient = Pick<AxiosInstance, 'get' | 'post'>;
