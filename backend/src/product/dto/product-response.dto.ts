import { ProductEntity } from '../../database/entities';

export class ProductResponseDto {
  id!: number;
  name!: string;
  price!: number;
  discount!: number;
  countInStock!: number;
  category!: string | null;
  createdAt!: Date;

  static from(entity: ProductEntity): ProductResponseDto {
    const dto = new ProductResponseDto();
    dto.id = Number(entity.id);
    dto.name = entity.name;
    dto.price = Number(entity.price); // Ensure decimal is converted to number
    dto.discount = Number(entity.discount);
    dto.countInStock = entity.countInStock;
    dto.category = entity.category?.name ?? null;
    dto.createdAt = entity.createdAt;
    return dto;
  }

  static fromArray(entities: ProductEntity[]): ProductResponseDto[] {
    return entities.map(entity => ProductResponseDto.from(entity));
  }
}
