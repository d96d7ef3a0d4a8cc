import 'reflect-metadata';
import { Test } from '@nestjs/testing';
import {
  ArgumentMetadata,
  BadRequestException,
  ParseBoolPipe,
  ParseIntPipe,
  RequestMethod,
  ValidationPipe,
} from '@nestjs/common';
import { METHOD_METADATA, PATH_METADATA } from '@nestjs/common/constants';
import { ProductsController } from './products.controller';
import { ProductsService } from './products.service';
import { PriceRangeQueryDto, TopSellingQueryDto } from './dto';

describe('ProductsController', () => {
  let controller: ProductsController;
  let service: jest.Mocked<ProductsService>;

  // mismo pipe global que main.ts
  const pipe = new ValidationPipe({ transform: true, whitelist: true });
  const query = (metatype: ArgumentMetadata['metatype']): ArgumentMetadata => ({ type: 'query', metatype });

  beforeEach(async () => {
    const mockService = {
      findByPriceRange: jest.fn().mockResolvedValue([]),
      countByPriceRange: jest.fn().mockResolvedValue(0),
      findTopSelling: jest.fn().mockResolvedValue({ items: [], page: 0, size: 10, total: 0, pages: 0 }),
      findByAvailable: jest.fn().mockResolvedValue([]),
      findOne: jest.fn(),
    };

    const module = await Test.createTestingModule({
      controllers: [ProductsController],
      providers: [{ provide: ProductsService, useValue: mockService }],
    }).compile();

    controller = module.get(ProductsController);
    service = module.get(ProductsService);
  });

  afterEach(() => {
    jest.clearAllMocks();
  });

  describe('top-selling query', () => {
    it('defaults to the first page of ten', async () => {
      const dto = await pipe.transform({ category: 'Electronics' }, query(TopSellingQueryDto));

      expect(dto).toBeInstanceOf(TopSellingQueryDto);
      expect(dto.page).toBe(0);
      expect(dto.size).toBe(10);

      await controller.topSelling(dto);
      expect(service.findTopSelling).toHaveBeenCalledWith('Electronics', { page: 0, size: 10 });
    });

    it('converts page and size from the query string', async () => {
      const dto = await pipe.transform({ category: 'Electronics', page: '2', size: '5' }, query(TopSellingQueryDto));

      await controller.topSelling(dto);
      expect(service.findTopSelling).toHaveBeenCalledWith('Electronics', { page: 2, size: 5 });
    });

    it('rejects a size of zero', async () => {
      await expect(
        pipe.transform({ category: 'Electronics', size: '0' }, query(TopSellingQueryDto)),
      ).rejects.toBeInstanceOf(BadRequestException);
    });
  });

  describe('price-range query', () => {
    it('turns minPrice and maxPrice into numbers', async () => {
      const dto = await pipe.transform(
        { category: 'Electronics', minPrice: '700', maxPrice: '1500' },
        query(PriceRangeQueryDto),
      );

      expect(dto.minPrice).toBe(700);
      expect(dto.maxPrice).toBe(1500);

      await controller.priceRange(dto);
      expect(service.findByPriceRange).toHaveBeenCalledWith('Electronics', 700, 1500);

      await controller.priceRangeCount(dto);
      expect(service.countByPriceRange).toHaveBeenCalledWith('Electronics', 700, 1500);
    });

    it('rejects a non-numeric bound', async () => {
      await expect(
        pipe.transform({ category: 'Electronics', minPrice: 'cheap', maxPrice: '1500' }, query(PriceRangeQueryDto)),
      ).rejects.toBeInstanceOf(BadRequestException);
    });

    it('drops parameters the DTO does not declare', async () => {
      const dto = await pipe.transform(
        { category: 'Electronics', minPrice: '1', maxPrice: '2', sort: 'name' },
        query(PriceRangeQueryDto),
      );

      expect(dto).not.toHaveProperty('sort');
    });
  });

  describe('path params', () => {
    it('parses available/:flag as a boolean', async () => {
      const flag = await new ParseBoolPipe().transform('true', { type: 'param', data: 'flag' });
      expect(flag).toBe(true);

      await controller.byAvailable(flag);
      expect(service.findByAvailable).toHaveBeenCalledWith(true);

      await expect(new ParseBoolPipe().transform('false', { type: 'param', data: 'flag' })).resolves.toBe(false);
    });

    it('rejects a flag that is not true or false', async () => {
      await expect(new ParseBoolPipe().transform('yes', { type: 'param', data: 'flag' })).rejects.toBeInstanceOf(
        BadRequestException,
      );
    });

    it('rejects a non-numeric :id', async () => {
      await expect(new ParseIntPipe().transform('abc', { type: 'param', data: 'id' })).rejects.toBeInstanceOf(
        BadRequestException,
      );
    });
  });

  describe('route order', () => {
    // Express prueba las rutas en orden de declaración: ':id' tiene que ir al final
    const getPaths = () => {
      const proto = ProductsController.prototype;
      return Object.getOwnPropertyNames(proto)
        .filter((name) => name !== 'constructor')
        .map((name) => Object.getOwnPropertyDescriptor(proto, name)?.value)
        .filter((handler) => Reflect.getMetadata(METHOD_METADATA, handler) === RequestMethod.GET)
        .map((handler): string => Reflect.getMetadata(PATH_METADATA, handler));
    };

    it('declares the fixed GET paths before :id', () => {
      expect(getPaths()).toEqual([
        '/',
        'count',
        'category/:category',
        'available/:flag',
        'search',
        'pattern',
        'price-range',
        'price-range/count',
        'low-stock',
        'top-selling',
        'most-expensive/:category',
        'average-price/:category',
        ':id',
      ]);
    });
  });
});
