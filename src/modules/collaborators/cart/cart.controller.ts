import { Body, Controller, Delete, Get, HttpCode, HttpStatus, Param, Post } from '@nestjs/common';
import { createLogger } from '../../../common/utils/logger';
import { CheckoutItemDto } from '../../checkout/dto/checkout-request.dto';
import { CartService, type Cart } from './cart.service';

@Controller('carts')
export class CartController {
  private readonly logger = createLogger(CartController.name);

  constructor(private readonly carts: CartService) {}

  @Get(':userId')
  get(@Param('userId') userId: string): Cart {
    return this.carts.get(userId);
  }

  @Post(':userId/items')
  addItem(@Param('userId') userId: string, @Body() item: CheckoutItemDto): Cart {
    return this.carts.addItem(userId, item);
  }

  @Delete(':userId')
  @HttpCode(HttpStatus.NO_CONTENT)
  empty(@Param('userId') userId: string): void {
    this.carts.empty(userId);
    this.logger.info('cart_emptied', { event: 'cart_emptied', userId });
  }
}
