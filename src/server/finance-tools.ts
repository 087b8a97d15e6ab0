import type { ToolDefinition } from "./tool-registry.js";
import {
  argNumber,
  argString,
  formatToolResponse,
  toolError,
} from "./tool-registry.js";
import {
  calculateEmi,
  isLoanInputError,
  monthlyToAnnualRate,
} from "../domain/financial/loan-math.js";

export function getToolDefinitions(): ToolDefinition[] {
  return [
    {
      name: "calculate_loan",
      description:
        "EMI, total repayment and total interest for a loan, with a risk verdict (above 36% a year is predatory, above 24% high) and cheaper government alternatives when the rate is high. Give either annual_rate or monthly_rate (moneylenders often quote per month).",
      inputSchema: {
        type: "object",
        properties: {
          principal: { type: "number", description: "Loan amount in rupees." },
          annual_rate: { type: "number", description: "Interest rate, % per year." },
          monthly_rate: {
            type: "number",
            description: "Interest rate, % per month. Converted to annual (x12).",
          },
          tenure_months: { type: "number", description: "Repayment period in months." },
        },
        required: ["principal", "tenure_months"],
      },
      handler: async (args, ctx) => {
        const principal = argNumber(args, "principal");
        const tenure = argNumber(args, "tenure_months");
        const annual = argNumber(args, "annual_rate");
        const monthly = argNumber(args, "monthly_rate");

        if (principal === undefined || tenure === undefined) {
          return toolError("principal and tenure_months are required.");
        }
        if (annual !== undefined && monthly !== undefined) {
          return toolError("Give annual_rate or monthly_rate, not both.");
        }
        const rate =
          annual ?? (monthly !== undefined ? monthlyToAnnualRate(monthly) : undefined);
        if (rate === undefined) {
          return toolError("annual_rate or monthly_rate is required.");
        }

        const emi = calculateEmi(principal, rate, tenure);
        if (isLoanInputError(emi)) return toolError(emi.error);

        return formatToolResponse({
          success: true,
          data: {
            ...emi,
            converted_from_monthly: monthly !== undefined,
            assessment: ctx.financial.assessRate(rate),
          },
          attribution: "",
        });
      },
    },
    {
      name: "check_scam",
      description:
        "Check a message or situation against known fraud patterns (OTP requests, advance fees, fake prizes, fake KYC calls, phishing links). Returns bilingual alerts on a match.",
      inputSchema: {
        type: "object",
        properties: {
          text: { type: "string", description: "What the citizen was told or asked to do." },
        },
        required: ["text"],
      },
      handler: async (args, ctx) => {
        const text = argString(args, "text");
        if (!text.trim()) return toolError("text is required.");

        return formatToolResponse({
          success: true,
          data: ctx.financial.checkScam(text),
          attribution: "",
        });
      },
    },
  ];
}
