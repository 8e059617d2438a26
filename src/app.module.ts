import { Module } from '@nestjs/common';
import { ConfigModule, ConfigType } from '@nestjs/config';
import { SequelizeModule } from '@nestjs/sequelize';
import { databaseConfig, toSequelizeOptions } from './config/database.config';
import { DalModule } from './dal/dal.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [databaseConfig],
    }),
    SequelizeModule.forRootAsync({
      imports: [ConfigModule],
      inject: [databaseConfig.KEY],
      useFactory: (config: ConfigType<typeof databaseConfig>) =>
        toSequelizeOptions(config),
    }),
    DalModule,
  ],
})
export class AppModule {}
