import { Controller, Get, NotFoundException, Param } from '@nestjs/common';
import type { CatalogProduct } from '../../checkout/application/ports/catalog.port';
import { ProductCatalogService } from './product-catalog.service';

@Controller('products')
export class ProductCatalogController {
  constructor(private readonly catalog: ProductCatalogService) {}

  @Get()
  list(): { products: CatalogProduct[] } {
    return { products: this.catalog.list() };
  }

  @Get(':id')
  get(@Param('id') productId: string): CatalogProduct {
    const product = this.catalog.find(productId);
    if (!product) {
      throw new NotFoundException(`Product ${productId} not found`);
    }

    return product;
  }
}
