import { v4 as uuidv4 } from 'uuid';
import { FinancialDecimal } from '../../common/utils/financial-math';
import { FillSide, SimulatedFill } from './paper-trading.types';

/**
 * Simulates fills at a reference price with fixed slippage.
 * One instance per PaperOrderGateway.
 */
export class FillSimulator {
  constructor(private readonly slippageBps: number) {}

  simulateFill(
    symbol: string,
    side: FillSide,
    price: number,
    quantity: number,
  ): SimulatedFill {
    return {
      orderId: uuidv4(),
      symbol,
      side,
      requestedPrice: price,
      filledPrice: this.applySlippage(price, side),
      quantity,
      timestamp: new Date(),
    };
  }

  private applySlippage(price: number, side: FillSide): number {
    const bps = new FinancialDecimal(this.slippageBps).div(10000);
    const multiplier =
      side === 'buy'
        ? new FinancialDecimal(1).plus(bps)
        : new FinancialDecimal(1).minus(bps);
    return new FinancialDecimal(price.toString()).mul(multiplier).toNumber();
  }
}
