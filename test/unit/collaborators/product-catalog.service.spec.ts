import { parseProducts, ProductCatalogService } from '@/modules/collaborators/product-catalog/product-catalog.service';

describe('ProductCatalogService', () => {
  it('loads the bundled product list', () => {
    const service = new ProductCatalogService();

    expect(service.list()).toHaveLength(10);
    expect(service.find('SKU-1001')).toEqual({
      id: 'SKU-1001',
      name: 'Canvas Tote Bag',
      price: { currencyCode: 'USD', amount: 18.5 },
    });
  });

  it('returns undefined for unknown products', () => {
    expect(new ProductCatalogService([]).find('SKU-1001')).toBeUndefined();
  });

  it('rejects malformed entries', () => {
    expect(() => parseProducts([{ id: 'SKU-1', name: 'Broken' }])).toThrow(
      'Invalid product at index 0 in data/products.json',
    );
  });
});
