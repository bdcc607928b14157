import { DeepPartial, EntityTarget, FindManyOptions, FindOneOptions, ObjectLiteral } from "typeorm";

/**
 * Database Interfaces
 *
 * The slice of TypeORM the services use, so tests can hand in
 * in-memory repositories. TypeORM's DataSource satisfies IDataSource.
 */

export interface IRepository<T extends ObjectLiteral> {
    findOne(options: FindOneOptions<T>): Promise<T | null>;
    find(options?: FindManyOptions<T>): Promise<T[]>;
    save(entity: DeepPartial<T>): Promise<T>;
}

export interface IDataSource {
    getRepository<T extends ObjectLiteral>(target: EntityTarget<T>): IRepository<T>;
}
