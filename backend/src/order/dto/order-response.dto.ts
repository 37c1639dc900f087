import { OrderEntity, OrderItemEntity, PaymentEntity } from '../../database/entities';

export class OrderItemResponseDto {
  productId!: number;
  quantity!: number;
  price!: number;

  static from(entity: OrderItemEntity): OrderItemResponseDto {
    const dto = new OrderItemResponseDto();
    dto.productId = Number(entity.productId);
    dto.quantity = entity.quantity;
    dto.price = Number(entity.price);
    return dto;
  }
}

export class PaymentResponseDto {
  id!: number;
  pspRef!: string | null;
  last4!: string | null;
  billingName!: string | null;
  billingAddress!: string | null;
  createdAt!: Date;

  static from(entity: PaymentEntity): PaymentResponseDto {
    const dto = new PaymentResponseDto();
    dto.id = Number(entity.id);
    dto.pspRef = entity.pspRef;
    dto.last4 = entity.last4;
    dto.billingName = entity.billingName;
    dto.billingAddress = entity.billingAddress;
    dto.createdAt = entity.createdAt;
    return dto;
  }
}

export class OrderResponseDto {
  id!: number;
  userId!: number;
  emailSnapshot!: string | null;
  shippingName!: string | null;
  shippingAddress!: string | null;
  shippingCity!: string | null;
  shippingState!: string | null;
  shippingZip!: string | null;
  shipCountry!: string | null;
  tax!: number;
  shippingPrice!: number;
  totalCost!: number;
  isPaid!: boolean;
  isDelivered!: boolean;
  purchaseDate!: Date;
  deliveryDate!: Date | null;
  items!: OrderItemResponseDto[];
  payments!: PaymentResponseDto[];

  static from(entity: OrderEntity): OrderResponseDto {
    const dto = new OrderResponseDto();
    dto.id = Number(entity.id);
    dto.userId = Number(entity.userId);
    dto.emailSnapshot = entity.emailSnapshot;
    dto.shippingName = entity.shippingName;
    dto.shippingAddress = entity.shippingAddress;
    dto.shippingCity = entity.shippingCity;
    dto.shippingState = entity.shippingState;
    dto.shippingZip = entity.shippingZip;
    dto.shipCountry = entity.shipCountry;
    // Decimal columns arrive as strings
    dto.tax = Number(entity.tax);
    dto.shippingPrice = Number(entity.shippingPrice);
    dto.totalCost = Number(entity.totalCost);
    dto.isPaid = entity.isPaid;
    dto.isDelivered = entity.isDelivered;
    dto.purchaseDate = entity.purchaseDate;
    dto.deliveryDate = entity.deliveryDate;
    dto.items = (entity.items ?? []).map(item => OrderItemResponseDto.from(item));
    dto.payments = (entity.payments ?? []).map(payment => PaymentResponseDto.from(payment));
    return dto;
  }
}
