import type { Usage } from './types.js'

/** Per-1k-token rates in USD, keyed by `provider:model` or by `provider`. */
export interface Pricing {
  inputUsdPer1k: Record<string, number>
  outputUsdPer1k: Record<string, number>
}

function rate(table: Record<string, number>, provider: string, model: string): number {
  const modelKey = `${provider}:${model}`
  if (Object.hasOwn(table, modelKey)) return table[modelKey] ?? 0
  if (Object.hasOwn(table, provider)) return table[provider] ?? 0
  return 0
}

/** Estimates the cost of one response; the model-specific rate wins over the provider rate. */
export function estimateCost(pricing: Pricing, provider: string, model: string, usage: Usage): number {
  return (
    (usage.inputTokens / 1000) * rate(pricing.inputUsdPer1k, provider, model) +
    (usage.outputTokens / 1000) * rate(pricing.outputUsdPer1k, provider, model)
  )
}

/** Sums usage across turns; the total carries a cost once any turn does. */
export function addUsage(total: Usage | undefined, next: Usage): Usage {
  if (!total) return { ...next }
  const costUsd =
    total.costUsd !== undefined || next.costUsd !== undefined ? (total.costUsd ?? 0) + (next.costUsd ?? 0) : undefined
  return {
    inputTokens: total.inputTokens + next.inputTokens,
    outputTokens: total.outputTokens + next.outputTokens,
    totalTokens: total.totalTokens + next.totalTokens,
    ...(costUsd !== undefined ? { costUsd } : {})
  }
}

export function formatUsage(usage: Usage): string {
  const base = `usage: in=${usage.inputTokens} out=${usage.outputTokens} total=${usage.totalTokens}`
  return usage.costUsd !== undefined ? `${base} est_cost=$${usage.costUsd.toFixed(4)}` : base
}
