import { Injectable, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { OrderEntity } from '../database/entities';

@Injectable()
export class OrderService {
  constructor(@InjectRepository(OrderEntity) private readonly orderRepository: Repository<OrderEntity>) {}

  /**
   * Find order by ID, with its items and payments
   */
  async findOne(id: number): Promise<OrderEntity> {
    const order = await this.orderRepository.findOne({
      where: { id },
      relations: { items: true, payments: true },
    });

    if (!order) {
      throw new NotFoundException(`Order ${id} not found`);
    }

    return order;
  }

  /**
   * Find orders by user ID
   */
  async findByUserId(userId: number): Promise<OrderEntity[]> {
    return this.orderRepository.find({
      where: { userId },
      relations: { items: true, payments: true },
      order: { purchaseDate: 'DESC' },
    });
  }
}
