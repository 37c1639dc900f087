import { Injectable, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { ProductEntity } from '../database/entities';

@Injectable()
export class ProductService {
  constructor(
    @InjectRepository(ProductEntity)
    private readonly productRepository: Repository<ProductEntity>,
  ) {}

  /**
   * Get all products, newest first
   */
  async findAll(): Promise<ProductEntity[]> {
    return this.productRepository.find({
      relations: { category: true },
      order: {
        createdAt: 'DESC',
      },
    });
  }

  /**
   * Get a single product by ID
   */
  async findOne(id: number): Promise<ProductEntity> {
    const product = await this.productRepository.findOne({
      where: { id },
      relations: { category: true },
    });

    if (!product) {
      throw new NotFoundException(`Product with ID ${id} not found`);
    }

    return product;
  }

  /**
   * Get products by category name
   */
  async findByCategory(category: string): Promise<ProductEntity[]> {
    return this.productRepository.find({
      where: {
        category: { name: category },
      },
      relations: { category: true },
      order: {
        name: 'ASC',
      },
    });
  }
}
