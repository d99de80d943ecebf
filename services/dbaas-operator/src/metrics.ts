import { type Counter, metrics as otelMetrics } from '@opentelemetry/api'

type OperatorMetrics = {
  reconciles: Counter
  childOperations: Counter
}

export type ReconcileOutcome = 'success' | 'error'

let operatorMetrics: OperatorMetrics | null = null

const ensureMetrics = () => {
  if (operatorMetrics) return operatorMetrics
  const meter = otelMetrics.getMeter('dbaas-operator')
  operatorMetrics = {
    reconciles: meter.createCounter('dbaas_reconcile_total', {
      description: 'Count of reconcile invocations by controller and outcome.',
    }),
    childOperations: meter.createCounter('dbaas_child_operations_total', {
      description: 'Count of provider child create-or-update results by kind.',
    }),
  }
  return operatorMetrics
}

export const recordReconcile = (controller: string, outcome: ReconcileOutcome) => {
  ensureMetrics().reconciles.add(1, { controller, outcome })
}

export const recordChildOperation = (kind: string, operation: string) => {
  ensureMetrics().childOperations.add(1, { kind, operation })
}
