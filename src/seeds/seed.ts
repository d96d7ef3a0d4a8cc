// src/seeds/seed.ts
// Útil con DB_TYPE=postgres o DB_DATABASE apuntando a un archivo; en :memory: los datos mueren con el proceso.
import 'dotenv/config';
import { DataSource, DeepPartial } from 'typeorm';
import { buildDataSourceOptions, describeTarget } from '../db/data-source';
import { Product } from '../products/product.entity';

const rows: Array<DeepPartial<Product>> = [
  { name: 'MacBook Pro', description: 'High-performance laptop for professionals', price: 1999.99, category: 'Electronics', stockQuantity: 50, available: true },
  { name: 'iPhone 14', description: 'Latest smartphone with advanced features', price: 999.99, category: 'Electronics', stockQuantity: 100, available: true },
  { name: 'iPad Pro', description: 'Powerful tablet for creative work', price: 799.99, category: 'Electronics', stockQuantity: 75, available: true },
  { name: 'AirPods Pro', description: 'Wireless noise-cancelling earbuds', price: 249.99, category: 'Audio', stockQuantity: 25, available: true },
  { name: 'Bluetooth Speaker', description: 'Portable wireless speaker', price: 89.99, category: 'Audio', stockQuantity: 0, available: false },
];

const AppDataSource = new DataSource(buildDataSourceOptions());

async function seedProducts(ds: DataSource) {
  const repo = ds.getRepository(Product);
  if (await repo.count() > 0) return;

  await repo.save(rows.map(r => repo.create(r)));
  console.log(`✅ Productos seed: ${rows.length}`);
}

(async () => {
  if (!AppDataSource.isInitialized) await AppDataSource.initialize();
  console.log(`🗄️  ${describeTarget(AppDataSource.options)}`);
  await seedProducts(AppDataSource);
  await AppDataSource.destroy();
  console.log('✅ Seed completado');
})().catch(async (e: unknown) => {
  console.error(e);
  if (AppDataSource.isInitialized) {
    await AppDataSource.destroy().catch((err: unknown) => console.error(err));
  }
  process.exit(1);
});
