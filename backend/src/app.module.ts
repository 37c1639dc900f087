import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { AnonymizationModule } from './anonymization/anonymization.module';
import { validate } from './config/env.validation';
import { OrderModule } from './order/order.module';
import { ProductModule } from './product/product.module';
import { UserModule } from './user/user.module';

@Module({
  imports: [
    // Config Module
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: '.env',
      validate,
    }),

    // TypeORM Module
    TypeOrmModule.forRootAsync({
      imports: [ConfigModule],
      useFactory: (configService: ConfigService) => ({
        type: 'mysql',
        host: configService.get<string>('DB_HOST'),
        port: configService.get<number>('DB_PORT'),
        username: configService.get<string>('DB_USERNAME'),
        password: configService.get<string>('DB_PASSWORD'),
        database: configService.get<string>('DB_DATABASE'),
        entities: [__dirname + '/**/*.entity{.ts,.js}'],
        // bigint ids as numbers while they fit
        supportBigNumbers: true,
        bigNumberStrings: false,
        synchronize: false, // schema is owned by db/init.sql
        logging: ['error', 'warn'],
      }),
      inject: [ConfigService],
    }),

    // Anonymization Module
    AnonymizationModule,

    // User Module
    UserModule,

    // Order Module
    OrderModule,

    // Product Module
    ProductModule,
  ],
})
export class AppModule {}
