import { Injectable } from '@nestjs/common';
import { InjectDataSource } from '@nestjs/typeorm';
import { DataSource, EntityManager } from 'typeorm';
import { TypeOrmOrderStore } from './typeorm-order.store';
import { TypeOrmOutboxStore } from './typeorm-outbox.store';
import {
  OrderStore,
  OutboxStore,
  TransactionStores,
  UnitOfWork,
} from './unit-of-work';

function storesFor(manager: EntityManager): TransactionStores {
  return {
    orders: new TypeOrmOrderStore(manager),
    outbox: new TypeOrmOutboxStore(manager),
  };
}

@Injectable()
export class TypeOrmUnitOfWork extends UnitOfWork {
  readonly orders: OrderStore;
  readonly outbox: OutboxStore;

  constructor(@InjectDataSource() private readonly dataSource: DataSource) {
    super();
    const stores = storesFor(dataSource.manager);
    this.orders = stores.orders;
    this.outbox = stores.outbox;
  }

  run<T>(work: (stores: TransactionStores) => Promise<T>): Promise<T> {
    return this.dataSource.transaction((manager) => work(storesFor(manager)));
  }

  async ping(): Promise<void> {
    await this.dataSource.query('SELECT 1');
  }
}
