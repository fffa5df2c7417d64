// Standalone data source for the TypeORM migration CLI.
import { DataSource } from 'typeorm';
import { ConfigService } from '../config/config.service';
import { buildDataSourceOptions } from './data-source.options';

export default new DataSource(buildDataSourceOptions(new ConfigService()));
