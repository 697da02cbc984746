import { Logger } from '@nestjs/common';
import { IOrderGateway } from '../../common/interfaces/order-gateway.interface';
import { IQuoteSource } from '../../common/interfaces/quote-source.interface';
import { TradeDirection } from '../../common/types/opportunity.type';
import {
  CloseOrderResult,
  GatewayBalance,
  OpenOrderResult,
} from '../../common/types/order.type';
import { GatewayMode } from '../../common/types/venue.type';
import { FinancialDecimal } from '../../common/utils/financial-math';
import { getCorrelationId } from '../../common/services/correlation-context';
import { FillSimulator } from './fill-simulator';
import { PaperGatewayOptions, PaperPosition } from './paper-trading.types';

/**
 * Test-mode order gateway. Reads live prices from the reference quote source
 * and fills against them with simulated slippage. Free balance shrinks by the
 * margin of open positions; realized PnL is never settled into it.
 * Plain class, instantiated by the ConnectorModule factory.
 */
export class PaperOrderGateway implements IOrderGateway {
  private readonly logger = new Logger(PaperOrderGateway.name);
  private readonly fillSimulator: FillSimulator;
  private readonly positions = new Map<string, PaperPosition>();

  constructor(
    private readonly referenceSource: IQuoteSource,
    private readonly options: PaperGatewayOptions,
  ) {
    this.fillSimulator = new FillSimulator(options.slippageBps);
  }

  getMode(): GatewayMode {
    return 'test';
  }

  async open(
    symbol: string,
    side: TradeDirection,
    size: number,
  ): Promise<OpenOrderResult> {
    const rejected = (reason: string): OpenOrderResult => ({
      orderId: '',
      symbol,
      side,
      size,
      fillPrice: null,
      status: 'rejected',
      timestamp: new Date(),
      reason,
    });

    if (!(size > 0)) {
      return rejected('size must be positive');
    }
    if (this.positions.has(symbol)) {
      return rejected('simulated position already open');
    }

    const quote = await this.referenceSource.getQuote(symbol);
    if (!quote) {
      return rejected('no reference price available');
    }

    const fill = this.fillSimulator.simulateFill(
      symbol,
      side === 'long' ? 'buy' : 'sell',
      quote.price,
      size,
    );
    const marginUsd = new FinancialDecimal(fill.filledPrice)
      .mul(size)
      .div(this.options.leverage)
      .toNumber();

    const { free } = this.computeBalance();
    if (marginUsd > free) {
      return rejected(
        `insufficient simulated balance: margin ${marginUsd} > free ${free}`,
      );
    }

    this.positions.set(symbol, {
      orderId: fill.orderId,
      side,
      size,
      entryPrice: fill.filledPrice,
      marginUsd,
    });

    this.logger.log({
      message: `[Paper] Opened ${side} ${symbol}`,
      module: 'connectors',
      correlationId: getCorrelationId(),
      data: {
        orderId: fill.orderId,
        size,
        requestedPrice: fill.requestedPrice,
        fillPrice: fill.filledPrice,
        marginUsd,
      },
    });

    return {
      orderId: fill.orderId,
      symbol,
      side,
      size,
      fillPrice: fill.filledPrice,
      status: 'filled',
      timestamp: fill.timestamp,
    };
  }

  async close(symbol: string): Promise<CloseOrderResult> {
    const position = this.positions.get(symbol);
    if (!position) {
      return {
        symbol,
        status: 'rejected',
        fillPrice: null,
        reason: 'no simulated position',
      };
    }

    const quote = await this.referenceSource.getQuote(symbol);
    if (!quote) {
      return {
        symbol,
        status: 'rejected',
        fillPrice: null,
        reason: 'no reference price available',
      };
    }

    const fill = this.fillSimulator.simulateFill(
      symbol,
      position.side === 'long' ? 'sell' : 'buy',
      quote.price,
      position.size,
    );
    this.positions.delete(symbol);

    this.logger.log({
      message: `[Paper] Closed ${position.side} ${symbol}`,
      module: 'connectors',
      correlationId: getCorrelationId(),
      data: {
        orderId: fill.orderId,
        entryPrice: position.entryPrice,
        fillPrice: fill.filledPrice,
        releasedMarginUsd: position.marginUsd,
      },
    });

    return { symbol, status: 'closed', fillPrice: fill.filledPrice };
  }

  balance(): Promise<GatewayBalance> {
    return Promise.resolve(this.computeBalance());
  }

  /** Quote source lifecycle is owned by the engine, not the gateway. */
  connect(): Promise<void> {
    return Promise.resolve();
  }

  disconnect(): Promise<void> {
    this.positions.clear();
    return Promise.resolve();
  }

  private computeBalance(): GatewayBalance {
    let locked = new FinancialDecimal(0);
    for (const position of this.positions.values()) {
      locked = locked.plus(position.marginUsd);
    }
    const total = this.options.startingBalanceUsd;
    return {
      free: new FinancialDecimal(total).minus(locked).toNumber(),
      total,
    };
  }
}
