export type RiskLevel = "HIGH" | "MEDIUM" | "LOW";

export interface EmiBreakdown {
  principal: number;
  annual_rate: number;
  tenure_months: number;
  monthly_emi: number;
  total_payment: number;
  total_interest: number;
  interest_percentage: number;
  is_predatory: boolean;
  risk_level: RiskLevel;
}

export interface LoanInputError {
  error: string;
}

/** Annual rates above this are predatory. */
export const PREDATORY_RATE = 36;
/** Annual rates above this are high. */
export const HIGH_RATE = 24;

export function riskLevel(annualRate: number): RiskLevel {
  if (annualRate > PREDATORY_RATE) return "HIGH";
  if (annualRate > HIGH_RATE) return "MEDIUM";
  return "LOW";
}

function roundTo(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

/**
 * Standard reducing-balance EMI:
 *   emi = P · r · (1 + r)^n / ((1 + r)^n − 1), with r = annualRate / 1200.
 * Money values are rounded to whole rupees.
 */
export function calculateEmi(
  principal: number,
  annualRate: number,
  tenureMonths: number,
): EmiBreakdown | LoanInputError {
  const valid = [principal, annualRate, tenureMonths].every(
    (n) => Number.isFinite(n) && n > 0,
  );
  if (!valid) {
    return { error: "Invalid loan parameters" };
  }

  const r = annualRate / (12 * 100);
  const growth = (1 + r) ** tenureMonths;
  const emi = (principal * r * growth) / (growth - 1);
  const totalPayment = emi * tenureMonths;
  const totalInterest = totalPayment - principal;

  return {
    principal,
    annual_rate: annualRate,
    tenure_months: tenureMonths,
    monthly_emi: Math.round(emi),
    total_payment: Math.round(totalPayment),
    total_interest: Math.round(totalInterest),
    interest_percentage: roundTo((totalInterest / principal) * 100, 1),
    is_predatory: annualRate > PREDATORY_RATE,
    risk_level: riskLevel(annualRate),
  };
}

export function isLoanInputError(
  result: EmiBreakdown | LoanInputError,
): result is LoanInputError {
  return "error" in result;
}

/** Moneylenders often quote per month; 5% a month is 60% a year. */
export function monthlyToAnnualRate(monthlyRate: number): number {
  return monthlyRate * 12;
}
