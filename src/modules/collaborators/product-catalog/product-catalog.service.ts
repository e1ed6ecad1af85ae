import { Inject, Injectable, Optional } from '@nestjs/common';
import { isRecord, readNonEmptyString } from '../../../common/utils/object.utils';
import type { CatalogProduct } from '../../checkout/application/ports/catalog.port';
import { parseMoney } from '../../checkout/domain';
import { loadJsonDataFile } from '../shared/data-loader';

export const PRODUCT_CATALOG_DATA = Symbol('PRODUCT_CATALOG_DATA');
export const PRODUCTS_DATA_FILE = 'data/products.json';

@Injectable()
export class ProductCatalogService {
  private readonly products: Map<string, CatalogProduct>;

  constructor(
    @Optional()
    @Inject(PRODUCT_CATALOG_DATA)
    products?: CatalogProduct[],
  ) {
    const entries = products ?? parseProducts(loadJsonDataFile(PRODUCTS_DATA_FILE));
    this.products = new Map(entries.map((product) => [product.id, product]));
  }

  list(): CatalogProduct[] {
    return [...this.products.values()];
  }

  find(productId: string): CatalogProduct | undefined {
    return this.products.get(productId);
  }
}

export function parseProducts(input: unknown): CatalogProduct[] {
  if (!Array.isArray(input)) {
    throw new Error(`${PRODUCTS_DATA_FILE} must contain an array of products`);
  }

  return input.map((entry: unknown, index) => {
    const id = isRecord(entry) ? readNonEmptyString(entry, 'id') : undefined;
    const name = isRecord(entry) ? readNonEmptyString(entry, 'name') : undefined;
    const price = isRecord(entry) ? parseMoney(entry.price) : undefined;
    if (!id || !name || !price) {
      throw new Error(`Invalid product at index ${index} in ${PRODUCTS_DATA_FILE}`);
    }

    return { id, name, price };
  });
}
