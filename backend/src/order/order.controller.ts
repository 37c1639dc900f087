import { Controller, Get, Param, ParseIntPipe } from '@nestjs/common';
import { OrderResponseDto } from './dto';
import { OrderService } from './order.service';

@Controller('orders')
export class OrderController {
  constructor(private readonly orderService: OrderService) {}

  @Get(':id')
  async getOrder(@Param('id', ParseIntPipe) id: number): Promise<OrderResponseDto> {
    const order = await this.orderService.findOne(id);
    return OrderResponseDto.from(order);
  }

  @Get('user/:userId')
  async getUserOrders(@Param('userId', ParseIntPipe) userId: number): Promise<OrderResponseDto[]> {
    const orders = await this.orderService.findByUserId(userId);
    return orders.map(order => OrderResponseDto.from(order));
  }
}
