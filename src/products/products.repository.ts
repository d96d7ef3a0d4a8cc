import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { DeepPartial, Repository, SelectQueryBuilder } from 'typeorm';
import { Product } from './product.entity';

export type PageRequest = { page: number; size: number };

// columnas que se insertan cuando el id lo trae el llamador
const INSERT_COLUMNS_WITH_ID = ['id', 'name', 'description', 'price', 'category', 'stockQuantity', 'available'];

const finite = (...values: number[]) => values.every((v) => Number.isFinite(v));

// %, _ y \ se toman literales dentro de LIKE ... ESCAPE '\'
const escapeLike = (s: string) => s.replace(/[\\%_]/g, (c) => `\\${c}`);

@Injectable()
export class ProductsRepository {
  constructor(@InjectRepository(Product) private readonly repo: Repository<Product>) {}

  private qb(): SelectQueryBuilder<Product> {
    return this.repo.createQueryBuilder('p');
  }

  private get isPostgres() {
    return this.repo.manager.connection.options.type === 'postgres';
  }

  // "contiene" sensible a mayúsculas, sin comodines
  private containsCaseSensitive(column: string, param: string) {
    return this.isPostgres
      ? `strpos(${column}, :${param}) > 0`
      : `instr(${column}, :${param}) > 0`;
  }

  // ---------- CRUD ----------

  /**
   * Sin id: inserta y asigna uno nuevo. Con id: pisa la fila existente,
   * o la inserta con ese mismo id si no existe.
   */
  async save(product: DeepPartial<Product>): Promise<Product> {
    const entity = this.repo.create(product);
    if (entity.available == null) entity.available = false;

    if (entity.id != null && !(await this.repo.existsBy({ id: entity.id }))) {
      // TypeORM descarta los ids explícitos de columnas autoincrementales en postgres
      await this.repo
        .createQueryBuilder()
        .insert()
        .into(Product, INSERT_COLUMNS_WITH_ID)
        .values(entity)
        .execute();
      if (this.isPostgres) await this.syncIdSequence();
      return this.repo.findOneByOrFail({ id: entity.id });
    }

    return this.repo.save(entity);
  }

  // el INSERT con id explícito no avanza el SERIAL; sin esto el próximo nextval puede chocar
  private async syncIdSequence() {
    const table = this.repo.metadata.tableName;
    await this.repo.query(
      `SELECT setval(pg_get_serial_sequence($1, 'id'), GREATEST((SELECT MAX(id) FROM "${table}"), 1))`,
      [table],
    );
  }

  async findById(id: number): Promise<Product | null> {
    if (!Number.isInteger(id)) return null;
    return this.repo.findOneBy({ id });
  }

  findAll(): Promise<Product[]> {
    return this.repo.find({ order: { id: 'ASC' } });
  }

  async delete(product: Pick<Product, 'id'>): Promise<void> {
    await this.deleteById(product.id);
  }

  async deleteById(id: number): Promise<void> {
    if (!Number.isInteger(id)) return;
    await this.repo.delete({ id });
  }

  async deleteAll(): Promise<void> {
    await this.repo.createQueryBuilder().delete().from(Product).execute();
  }

  count(): Promise<number> {
    return this.repo.count();
  }

  // ---------- consultas ----------

  findByCategory(category: string): Promise<Product[]> {
    return this.qb()
      .where('p.category = :category', { category })
      .orderBy('p.id', 'ASC')
      .getMany();
  }

  findByAvailable(available: boolean): Promise<Product[]> {
    return this.qb()
      .where(`p.available = ${available ? 'TRUE' : 'FALSE'}`)
      .orderBy('p.id', 'ASC')
      .getMany();
  }

  findByNameContainingIgnoreCase(name: string): Promise<Product[]> {
    return this.qb()
      .where(`LOWER(p.name) LIKE :name ESCAPE '\\'`, { name: `%${escapeLike(name.toLowerCase())}%` })
      .orderBy('p.id', 'ASC')
      .getMany();
  }

  async findByPriceRangeAndCategory(minPrice: number, maxPrice: number, category: string): Promise<Product[]> {
    if (!finite(minPrice, maxPrice) || minPrice > maxPrice) return [];
    return this.qb()
      .where('p.category = :category', { category })
      .andWhere('p.price BETWEEN :minPrice AND :maxPrice', { minPrice, maxPrice })
      .orderBy('p.id', 'ASC')
      .getMany();
  }

  async findAvailableProductsWithLowStockByCategory(threshold: number, category: string): Promise<Product[]> {
    if (!finite(threshold)) return [];
    return this.qb()
      .where('p.available = TRUE')
      .andWhere('p.stockQuantity < :threshold', { threshold })
      .andWhere('p.category = :category', { category })
      .orderBy('p.id', 'ASC')
      .getMany();
  }

  private topSellingQuery(category: string) {
    return this.qb()
      .where('p.category = :category', { category })
      .andWhere('p.available = TRUE');
  }

  /**
   * "Más vendidos" = disponibles con menos stock. `page` empieza en 0.
   */
  async findTopSellingProductsByCategory(category: string, { page, size }: PageRequest): Promise<Product[]> {
    if (!Number.isInteger(page) || !Number.isInteger(size) || page < 0 || size < 1) return [];
    return this.topSellingQuery(category)
      .orderBy('p.stockQuantity', 'ASC')
      .addOrderBy('p.id', 'ASC')
      .offset(page * size)
      .limit(size)
      .getMany();
  }

  countTopSellingProductsByCategory(category: string): Promise<number> {
    return this.topSellingQuery(category).getCount();
  }

  findByNamePatternNative(pattern: string): Promise<Product[]> {
    return this.qb()
      .where(this.containsCaseSensitive('p.name', 'pattern'), { pattern })
      .andWhere('p.available = TRUE')
      .orderBy('p.id', 'ASC')
      .getMany();
  }

  // empate de precio → gana el id más bajo
  findFirstByCategoryOrderByPriceDesc(category: string): Promise<Product | null> {
    return this.qb()
      .where('p.category = :category', { category })
      .orderBy('p.price', 'DESC')
      .addOrderBy('p.id', 'ASC')
      .limit(1)
      .getOne();
  }

  /**
   * Promedio de precio de la categoría; `null` si no hay productos.
   */
  async calculateAveragePriceByCategory(category: string): Promise<number | null> {
    const row = await this.qb()
      .select('AVG(p.price)', 'avg')
      .where('p.category = :category', { category })
      .getRawOne<{ avg: string | number | null }>();

    return row?.avg == null ? null : Number(row.avg);
  }

  async countByCategoryAndPriceRange(category: string, minPrice: number, maxPrice: number): Promise<number> {
    if (!finite(minPrice, maxPrice) || minPrice > maxPrice) return 0;
    return this.qb()
      .where('p.category = :category', { category })
      .andWhere('p.price BETWEEN :minPrice AND :maxPrice', { minPrice, maxPrice })
      .getCount();
  }
}
