// Entry point for the typeorm CLI (npm run migration:run / migration:revert)
import 'reflect-metadata';
import { DataSource } from 'typeorm';
import { ConfigService } from '../config/config.service';
import { buildDataSourceOptions } from './data-source.options';

export default new DataSource(buildDataSourceOptions(new ConfigService()));
