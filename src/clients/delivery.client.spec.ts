import { ForbiddenException, ServiceUnavailableException } from '@nestjs/common';
import { AxiosError, AxiosHeaders, AxiosResponse } from 'axios';
import { DeliveryClient } from './delivery.client';

function notFound(): AxiosError {
  const response: AxiosResponse = {
    data: { data: null, message: 'Not found' },
    status: 404,
    statusText: 'Not Found',
    headers: {},
    config: { headers: new AxiosHeaders() },
  };
  return new AxiosError('Request failed with status code 404', 'ERR_BAD_REQUEST', undefined, undefined, response);
}

describe('DeliveryClient', () => {
  const http = { get: jest.fn() };
  const client = new DeliveryClient(http);
  const address = { id: 9, patient_id: 42, line1: '1 Test Road', city: 'Testville' };

  beforeEach(() => jest.clearAllMocks());

  it('unwraps the address from the response envelope', async () => {
    http.get.mockResolvedValue({ data: { data: address, message: 'ok' } });

    await expect(client.getDeliveryAddress(9)).resolves.toEqual(address);
    expect(http.get).toHaveBeenCalledWith('/delivery-addresses/9');
  });

  it('returns null for unknown addresses', async () => {
    http.get.mockRejectedValue(notFound());

    await expect(client.getDeliveryAddress(9)).resolves.toBeNull();
  });

  it('returns the address to its owner', async () => {
    http.get.mockResolvedValue({ data: { data: address, message: 'ok' } });

    await expect(client.getOwnedDeliveryAddress(9, 42)).resolves.toEqual(address);
  });

  it('refuses an address registered by another patient', async () => {
    http.get.mockResolvedValue({ data: { data: address, message: 'ok' } });

    await expect(client.getOwnedDeliveryAddress(9, 7)).rejects.toThrow(
      new ForbiddenException('Patient does not own this delivery address'),
    );
  });

  it('refuses a missing address', async () => {
    http.get.mockResolvedValue({ data: { data: null, message: 'Delivery address not found' } });

    await expect(client.getOwnedDeliveryAddress(9, 42)).rejects.toThrow(ForbiddenException);
  });

  it('reports the delivery service as unreachable on network errors', async () => {
    http.get.mockRejectedValue(new AxiosError('timeout of 5000ms exceeded', 'ECONNABORTED'));

    await expect(client.getDeliveryAddress(9)).rejects.toThrow(
      new ServiceUnavailableException('DeliveryService is unreachable'),
    );
  });
});
