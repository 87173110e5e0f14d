import type { Container } from '../../infra/container.js';
import { BPS_DENOMINATOR, MAX_SLIPPAGE_BPS } from '../../config/constants.js';
import { EngineError, SwapSettlementUnknown, describeError, isEngineError } from '../../services/engine-error.js';
import type { BalanceDelta, ExecutionVenue } from '../../types/collaborators.js';

/**
 * Converts deposit into locked asset through the execution venue. This is the
 * only place external price risk enters the engine.
 */
export class PriceExecutionAdapter {
  private readonly container: Container;
  private readonly venue: ExecutionVenue;

  constructor(container: Container, venue: ExecutionVenue) {
    this.container = container;
    this.venue = venue;
  }

  spenderFor(pair: string): string {
    return this.venue.spenderFor(pair);
  }

  async quoteExactInput(pair: string, inputAmount: bigint): Promise<bigint> {
    return this.venue.quoteExactInput(pair, inputAmount);
  }

  defaultMinOutput(quote: bigint): bigint {
    return (quote * (BPS_DENOMINATOR - MAX_SLIPPAGE_BPS)) / BPS_DENOMINATOR;
  }

  async swapExactInput(pair: string, inputAmount: bigint, minOutputAmount: bigint): Promise<bigint> {
    const { logger } = this.container;

    if (inputAmount <= 0n) {
      throw new EngineError('ZeroAmount', 'Swap input must be positive');
    }

    let delta: BalanceDelta;
    try {
      delta = await this.venue.swapExactInput(
        { pair, amountIn: inputAmount, minAmountOut: minOutputAmount, priceLimit: 0n },
        (proposed) => this.assertMinimumOutput(proposed, minOutputAmount),
      );
    } catch (err) {
      if (isEngineError(err)) throw err;
      if (err instanceof SwapSettlementUnknown) {
        logger.error({ err, pair, reference: err.reference, inputAmount: inputAmount.toString() }, 'Swap outcome unknown');
        throw new EngineError('SwapUnsettled', err.message, {
          context: { pair, reference: err.reference },
          committed: true,
          cause: err,
        });
      }
      logger.error({ err, pair, inputAmount: inputAmount.toString() }, 'Venue swap failed');
      throw new EngineError('SwapFailed', `Venue swap failed: ${describeError(err)}`, {
        context: { pair },
        cause: err,
      });
    }

    // Network venues report the delta only after settlement, so the deposit is already spent.
    try {
      this.assertMinimumOutput(delta, minOutputAmount);
    } catch (err) {
      logger.error({ err, pair, outputAmount: delta.locked.toString() }, 'Swap settled below the minimum output');
      throw new EngineError('SwapUnsettled', `Swap settled below the minimum output: ${describeError(err)}`, {
        context: { pair, reference: null, outputAmount: delta.locked.toString() },
        committed: true,
        cause: err,
      });
    }

    logger.info(
      {
        pair,
        inputAmount: inputAmount.toString(),
        outputAmount: delta.locked.toString(),
        minOutputAmount: minOutputAmount.toString(),
      },
      'Swap executed',
    );

    return delta.locked;
  }

  private assertMinimumOutput(delta: BalanceDelta, minOutputAmount: bigint): void {
    if (delta.locked <= 0n || delta.locked < minOutputAmount) {
      throw new EngineError('SlippageExceeded', 'Swap output is below the minimum', {
        context: {
          outputAmount: delta.locked.toString(),
          minOutputAmount: minOutputAmount.toString(),
        },
      });
    }
  }
}
