import { Module } from '@nestjs/common';
import { ConnectorModule } from '../../connectors/connector.module';
import { MarketDataService } from './market-data.service';

@Module({
  imports: [ConnectorModule],
  providers: [MarketDataService],
  exports: [MarketDataService],
})
export class MarketDataModule {}
