import { NotFoundException } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import { CategoryEntity, ProductEntity } from '../database/entities';
import { ProductResponseDto } from './dto';
import { ProductService } from './product.service';

describe('ProductService', () => {
  let service: ProductService;
  let repository: { find: jest.Mock; findOne: jest.Mock };

  const shoes = Object.assign(new CategoryEntity(), { id: 3, name: 'Shoes' });
  const redShoe = Object.assign(new ProductEntity(), {
    id: 7,
    name: 'Red Shoe',
    price: '79.00',
    discount: '0.00',
    countInStock: 12,
    createdAt: new Date('2024-01-01T00:00:00Z'),
    categoryId: 3,
    createdByUserId: 1,
    category: shoes,
  });

  beforeEach(async () => {
    repository = { find: jest.fn(), findOne: jest.fn() };

    const moduleRef = await Test.createTestingModule({
      providers: [ProductService, { provide: getRepositoryToken(ProductEntity), useValue: repository }],
    }).compile();

    service = moduleRef.get(ProductService);
  });

  it('should query products of a category by category name', async () => {
    repository.find.mockResolvedValue([redShoe]);

    await expect(service.findByCategory('Shoes')).resolves.toEqual([redShoe]);
    expect(repository.find).toHaveBeenCalledWith({
      where: { category: { name: 'Shoes' } },
      relations: { category: true },
      order: { name: 'ASC' },
    });
  });

  it('should throw NotFoundException for an unknown product', async () => {
    repository.findOne.mockResolvedValue(null);

    await expect(service.findOne(99)).rejects.toThrow(new NotFoundException('Product with ID 99 not found'));
  });

  it('should flatten the category and convert decimals in the response', () => {
    expect(ProductResponseDto.from(redShoe)).toEqual({
      id: 7,
      name: 'Red Shoe',
      price: 79,
      discount: 0,
      countInStock: 12,
      category: 'Shoes',
      createdAt: new Date('2024-01-01T00:00:00Z'),
    });
  });

  it('should build a ProductResponseDto instance', () => {
    expect(ProductResponseDto.from(redShoe)).toBeInstanceOf(ProductResponseDto);
  });

  it('should report a missing category as null', () => {
    const uncategorized = Object.assign(new ProductEntity(), { ...redShoe, categoryId: null, category: null });

    expect(ProductResponseDto.from(uncategorized).category).toBeNull();
  });
});
