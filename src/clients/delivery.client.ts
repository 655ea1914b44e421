import { ForbiddenException, Inject, Injectable } from '@nestjs/common';
import { StdResponse } from '../common/std-response';
import { DeliveryAddress } from '../entities/order.entity';
import { HttpGetter, isNotFound, toServiceError } from './http-errors';
import { DELIVERY_HTTP } from './tokens';

@Injectable()
export class DeliveryClient {
  constructor(@Inject(DELIVERY_HTTP) private readonly http: HttpGetter) {}

  async getDeliveryAddress(id: number): Promise<DeliveryAddress | null> {
    try {
      const response = await this.http.get<StdResponse<DeliveryAddress>>(`/delivery-addresses/${id}`);
      return response.data.data ?? null;
    } catch (error) {
      if (isNotFound(error)) {
        return null;
      }
      throw toServiceError('DeliveryService', error);
    }
  }

  /** Fetches the address and checks that it was registered by `patientId`. */
  async getOwnedDeliveryAddress(id: number, patientId: number): Promise<DeliveryAddress> {
    const address = await this.getDeliveryAddress(id);
    if (!address || address.patient_id !== patientId) {
      throw new ForbiddenException('Patient does not own this delivery address');
    }
    return address;
  }
}
