import { Module } from '@nestjs/common';
import { FuturesTickerQuoteSource } from './futures/futures-ticker.quote-source';
import { DexScreenerQuoteSource } from './dexscreener/dexscreener.quote-source';
import {
  COMPARISON_QUOTE_SOURCE,
  ORDER_GATEWAY,
  REFERENCE_QUOTE_SOURCE,
} from './connector.constants';
import { PaperOrderGateway } from './paper/paper-order.gateway';
import { ENGINE_CONFIG } from '../common/config/engine-config.constants';
import { EngineConfig } from '../common/config/engine-config.type';
import { IOrderGateway, IQuoteSource } from '../common/interfaces';
import { ConfigValidationError } from '../common/errors/config-validation-error';

/** Mode is read once here; the gateway instance never changes for the run. */
function createOrderGateway(
  config: EngineConfig,
  referenceSource: IQuoteSource,
): IOrderGateway {
  if (config.gatewayMode === 'test') {
    return new PaperOrderGateway(referenceSource, {
      startingBalanceUsd: config.paper.startingBalanceUsd,
      slippageBps: config.paper.slippageBps,
      leverage: config.risk.leverage,
    });
  }
  throw new ConfigValidationError('Invalid gateway mode', [
    `gateway.mode '${config.gatewayMode}' has no bundled venue trading client`,
  ]);
}

@Module({
  providers: [
    FuturesTickerQuoteSource,
    DexScreenerQuoteSource,
    { provide: REFERENCE_QUOTE_SOURCE, useExisting: FuturesTickerQuoteSource },
    { provide: COMPARISON_QUOTE_SOURCE, useExisting: DexScreenerQuoteSource },
    {
      provide: ORDER_GATEWAY,
      useFactory: createOrderGateway,
      inject: [ENGINE_CONFIG, REFERENCE_QUOTE_SOURCE],
    },
  ],
  exports: [REFERENCE_QUOTE_SOURCE, COMPARISON_QUOTE_SOURCE, ORDER_GATEWAY],
})
export class ConnectorModule {}
