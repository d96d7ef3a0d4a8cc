import {
  Body,
  Controller,
  Delete,
  Get,
  Param,
  ParseBoolPipe,
  ParseIntPipe,
  Patch,
  Post,
  Query,
} from '@nestjs/common';
import { ProductsService } from './products.service';
import {
  CreateProductDto,
  LowStockQueryDto,
  NameSearchQueryDto,
  PatternQueryDto,
  PriceRangeQueryDto,
  TopSellingQueryDto,
  UpdateProductDto,
} from './dto';

@Controller('products')
export class ProductsController {
  constructor(private readonly service: ProductsService) {}

  @Get()
  list() {
    return this.service.findAll();
  }

  @Get('count')
  count() {
    return this.service.count();
  }

  @Get('category/:category')
  byCategory(@Param('category') category: string) {
    return this.service.findByCategory(category);
  }

  @Get('available/:flag')
  byAvailable(@Param('flag', ParseBoolPipe) flag: boolean) {
    return this.service.findByAvailable(flag);
  }

  // nombre contiene, sin distinguir mayúsculas
  @Get('search')
  search(@Query() q: NameSearchQueryDto) {
    return this.service.searchByName(q.name);
  }

  // nombre contiene (distingue mayúsculas), sólo disponibles
  @Get('pattern')
  pattern(@Query() q: PatternQueryDto) {
    return this.service.findByNamePattern(q.pattern);
  }

  @Get('price-range')
  priceRange(@Query() q: PriceRangeQueryDto) {
    return this.service.findByPriceRange(q.category, q.minPrice, q.maxPrice);
  }

  @Get('price-range/count')
  priceRangeCount(@Query() q: PriceRangeQueryDto) {
    return this.service.countByPriceRange(q.category, q.minPrice, q.maxPrice);
  }

  @Get('low-stock')
  lowStock(@Query() q: LowStockQueryDto) {
    return this.service.findLowStock(q.category, q.threshold);
  }

  @Get('top-selling')
  topSelling(@Query() q: TopSellingQueryDto) {
    return this.service.findTopSelling(q.category, { page: q.page, size: q.size });
  }

  @Get('most-expensive/:category')
  mostExpensive(@Param('category') category: string) {
    return this.service.findMostExpensive(category);
  }

  @Get('average-price/:category')
  averagePrice(@Param('category') category: string) {
    return this.service.averagePrice(category);
  }

  @Get(':id')
  get(@Param('id', ParseIntPipe) id: number) {
    return this.service.findOne(id);
  }

  @Post()
  create(@Body() dto: CreateProductDto) {
    return this.service.create(dto);
  }

  @Patch(':id')
  update(@Param('id', ParseIntPipe) id: number, @Body() dto: UpdateProductDto) {
    return this.service.update(id, dto);
  }

  @Delete(':id')
  remove(@Param('id', ParseIntPipe) id: number) {
    return this.service.remove(id);
  }

  @Delete()
  removeAll() {
    return this.service.removeAll();
  }
}
