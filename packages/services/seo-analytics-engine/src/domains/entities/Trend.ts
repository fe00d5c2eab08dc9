/**
 * Domain Entity: trend and volatility classifications shared by the analyzers
 */

/** Significance-gated direction of a fitted series */
export type TrendDirection = 'up' | 'down' | 'flat' | 'insufficient_data';

/** Direction of a raw difference, without significance gating */
export type ChangeDirection = 'up' | 'down' | 'flat';

/** Coefficient-of-variation bands */
export type Volatility = 'low' | 'medium' | 'high' | 'unknown';

/** Sign of a regression slope, used for forecast narratives */
export type SlopeTrend = 'increasing' | 'decreasing' | 'stable';

export type Severity = 'critical' | 'high' | 'medium' | 'low';
