import { ServiceUnavailableException } from '@nestjs/common';
import axios, { AxiosInstance } from 'axios';

export type HttpGetter = Pick<AxiosInstance, 'get'>;

export function isNotFound(error: unknown): boolean {
  return axios.isAxiosError(error) && error.response?.status === 404;
}

/** Errors without a response mean the service could not be reached at all. */
export function toServiceError(service: string, error: unknown): Error {
  if (axios.isAxiosError(error) && !error.response) {
    return new ServiceUnavailableException(`${service} is unreachable`);
  }
  return error instanceof Error ? error : new Error(String(error));
}
