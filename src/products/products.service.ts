import {
  BadRequestException,
  Injectable,
  Logger,
  NotFoundException,
  ServiceUnavailableException,
} from '@nestjs/common';
import { ClassConstructor, plainToInstance } from 'class-transformer';
import { validate } from 'class-validator';
import { Product } from './product.entity';
import { PageRequest, ProductsRepository } from './products.repository';
import { CreateProductDto, UpdateProductDto } from './dto';
import { isStorageUnavailable } from '../common/storage-errors';

export type ProductPage = {
  items: Product[];
  page: number;
  size: number;
  total: number;
  pages: number;
};

export type AveragePrice = { category: string; averagePrice: number | null };

@Injectable()
export class ProductsService {
  private readonly logger = new Logger(ProductsService.name);

  constructor(private readonly products: ProductsRepository) {}

  // ---------- helpers ----------

  // Errores de conexión → 503; el resto se propaga tal cual. Sin reintentos.
  private async run<T>(op: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (e: unknown) {
      if (isStorageUnavailable(e)) {
        this.logger.error(`${op}: base de datos no disponible`, e instanceof Error ? e.stack : String(e));
        throw new ServiceUnavailableException('Base de datos no disponible');
      }
      throw e;
    }
  }

  // Valida también cuando se llama sin pasar por el ValidationPipe (scripts, otros servicios)
  private async validated<T extends object>(cls: ClassConstructor<T>, payload: object): Promise<T> {
    const dto = plainToInstance(cls, payload);
    const errors = await validate(dto, { whitelist: true });
    if (errors.length > 0) {
      throw new BadRequestException(errors.flatMap((e) => Object.values(e.constraints ?? {})));
    }
    return dto;
  }

  // ---------- CRUD ----------

  findAll() {
    return this.run('findAll', () => this.products.findAll());
  }

  async findOne(id: number) {
    const p = await this.run('findOne', () => this.products.findById(id));
    if (!p) throw new NotFoundException('Producto no encontrado');
    return p;
  }

  count() {
    return this.run('count', () => this.products.count());
  }

  async create(dto: CreateProductDto) {
    const data = await this.validated(CreateProductDto, dto);
    const saved = await this.run('create', () => this.products.save(data));
    this.logger.log(`Producto creado con ID: ${saved.id}`);
    return saved;
  }

  async update(id: number, dto: UpdateProductDto) {
    const data = await this.validated(UpdateProductDto, dto);
    const p = await this.findOne(id);

    // campos ausentes o vacíos no pisan el valor actual
    const patch: Partial<Product> = Object.fromEntries(
      Object.entries(data).filter(([, v]) => v !== undefined),
    );
    Object.assign(p, patch, { id: p.id });

    return this.run('update', () => this.products.save(p));
  }

  async remove(id: number) {
    await this.run('remove', () => this.products.deleteById(id));
  }

  async removeAll() {
    await this.run('removeAll', () => this.products.deleteAll());
    this.logger.warn('Se eliminaron todos los productos');
  }

  // ---------- consultas ----------

  findByCategory(category: string) {
    return this.run('findByCategory', () => this.products.findByCategory(category));
  }

  findByAvailable(available: boolean) {
    return this.run('findByAvailable', () => this.products.findByAvailable(available));
  }

  searchByName(name: string) {
    return this.run('searchByName', () => this.products.findByNameContainingIgnoreCase(name));
  }

  findByNamePattern(pattern: string) {
    return this.run('findByNamePattern', () => this.products.findByNamePatternNative(pattern));
  }

  findByPriceRange(category: string, minPrice: number, maxPrice: number) {
    return this.run('findByPriceRange', () =>
      this.products.findByPriceRangeAndCategory(minPrice, maxPrice, category),
    );
  }

  countByPriceRange(category: string, minPrice: number, maxPrice: number) {
    return this.run('countByPriceRange', () =>
      this.products.countByCategoryAndPriceRange(category, minPrice, maxPrice),
    );
  }

  findLowStock(category: string, threshold: number) {
    return this.run('findLowStock', () =>
      this.products.findAvailableProductsWithLowStockByCategory(threshold, category),
    );
  }

  async findTopSelling(category: string, { page, size }: PageRequest): Promise<ProductPage> {
    const [items, total] = await this.run('findTopSelling', () =>
      Promise.all([
        this.products.findTopSellingProductsByCategory(category, { page, size }),
        this.products.countTopSellingProductsByCategory(category),
      ]),
    );

    return {
      items,
      page,
      size,
      total,
      pages: size > 0 ? Math.max(1, Math.ceil(total / size)) : 1,
    };
  }

  async findMostExpensive(category: string) {
    const p = await this.run('findMostExpensive', () =>
      this.products.findFirstByCategoryOrderByPriceDesc(category),
    );
    if (!p) throw new NotFoundException(`Sin productos en la categoría ${category}`);
    return p;
  }

  async averagePrice(category: string): Promise<AveragePrice> {
    const averagePrice = await this.run('averagePrice', () =>
      this.products.calculateAveragePriceByCategory(category),
    );
    return { category, averagePrice };
  }
}
