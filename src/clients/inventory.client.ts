import { Inject, Injectable } from '@nestjs/common';
import { HttpGetter, toServiceError } from './http-errors';
import { INVENTORY_HTTP } from './tokens';

interface ProductPrice {
  id: number;
  unit_price: number;
}

@Injectable()
export class InventoryClient {
  constructor(@Inject(INVENTORY_HTTP) private readonly http: HttpGetter) {}

  /** Unit price per product id. Products the inventory does not return are absent. */
  async getUnitPrices(productIds: number[]): Promise<Map<number, number>> {
    const ids = [...new Set(productIds)];
    if (ids.length === 0) {
      return new Map();
    }

    let products: ProductPrice[];
    try {
      const response = await this.http.get<ProductPrice[]>('/products', {
        params: { ids: ids.join(',') },
      });
      products = response.data;
    } catch (error) {
      throw toServiceError('InventoryService', error);
    }

    return new Map(products.map((product) => [product.id, product.unit_price]));
  }
}
