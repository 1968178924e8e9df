import { Module, DynamicModule } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { User } from './entities/user.entity';
import { Session } from './entities/session.entity';

/** All entity classes registered in this database library */
const ENTITIES = [User, Session] as const;

/**
 * DatabaseModule: registers all TypeORM entity repositories.
 *
 * @example
 * ```ts
 * @Module({
 *   imports: [DatabaseModule.forFeature()],
 * })
 * export class SomeFeatureModule {}
 * ```
 */
@Module({})
export class DatabaseModule {
  static forFeature(): DynamicModule {
    return {
      module: DatabaseModule,
      imports: [TypeOrmModule.forFeature([...ENTITIES])],
      exports: [TypeOrmModule],
    };
  }

  /** Entity classes, for `TypeOrmModule.forRoot({ entities })`. */
  static get entities(): ReadonlyArray<typeof User | typeof Session> {
    return ENTITIES;
  }
}
