import { DataSourceOptions } from 'typeorm';
import { ConfigService } from '../config/config.service';
import { CreateStudentRecordsSchema1760000000000 } from '../migrations/1760000000000-CreateStudentRecordsSchema';
import { STUDENT_RECORDS_ENTITIES } from './entities';

export function buildDataSourceOptions(configService: ConfigService): DataSourceOptions {
  return {
    type: 'postgres',
    host: configService.get('DB_HOST'),
    port: configService.getNumber('DB_PORT', 5432),
    username: configService.get('DB_USERNAME'),
    password: configService.get('DB_PASSWORD'),
    database: configService.get('DB_DATABASE'),
    entities: STUDENT_RECORDS_ENTITIES,
    migrations: [CreateStudentRecordsSchema1760000000000],
    migrationsRun: configService.getBoolean('DB_MIGRATIONS_RUN', true),
    synchronize: false,
    logging:
      configService.get('NODE_ENV', 'development') === 'development'
        ? ['error', 'warn', 'migration']
        : ['error'],
  };
}
