import { Column, Entity } from 'typeorm';
import { BaseEntity } from '../common/base.entity';
import { decimalTransformer } from '../common/decimal.transformer';

@Entity('products')
export class Product extends BaseEntity {
  @Column({ type: 'varchar', length: 100 })
  name!: string;

  @Column({ type: 'varchar', length: 500, nullable: true })
  description?: string | null;

  @Column('decimal', { precision: 10, scale: 2, transformer: decimalTransformer })
  price!: number;

  @Column({ type: 'varchar', length: 255 })
  category!: string;

  @Column('integer')
  stockQuantity!: number;

  // en la tabla la columna se llama is_available
  @Column({ name: 'is_available', type: 'boolean', default: false })
  available!: boolean;
}
