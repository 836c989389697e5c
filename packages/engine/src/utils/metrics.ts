import { Registry, Counter } from 'prom-client'

let registry: Registry
let callCounter: Counter<string>
let rejectionCounter: Counter<string>
let transitionCounter: Counter<string>
let settledCounter: Counter<string>

function initMetrics(reg?: Registry) {
  registry = reg ?? new Registry()

  callCounter = new Counter({
    name: 'custodia_calls_total',
    help: 'Counts successful entry point calls',
    labelNames: ['engine', 'op'],
    registers: [registry]
  })

  rejectionCounter = new Counter({
    name: 'custodia_rejections_total',
    help: 'Counts rejected calls by engine and reason',
    labelNames: ['engine', 'reason'],
    registers: [registry]
  })

  transitionCounter = new Counter({
    name: 'custodia_transitions_total',
    help: 'Counts competition session transitions',
    labelNames: ['from', 'to'],
    registers: [registry]
  })

  settledCounter = new Counter({
    name: 'custodia_settled_amount_total',
    help: 'Amounts moved out of custody, in base units',
    labelNames: ['engine', 'kind'],
    registers: [registry]
  })
}

// initialize default metrics on module load
initMetrics()

export function setRegistry(reg: Registry) {
  initMetrics(reg)
}

export function countCall(engine: string, op: string) {
  callCounter.labels({ engine, op }).inc()
}

export function countRejection(engine: string, reason: string) {
  rejectionCounter.labels({ engine, reason }).inc()
}

export function countTransition(from: string, to: string) {
  transitionCounter.labels({ from, to }).inc()
}

// prom-client counters are float64; amounts beyond 2^53 lose precision here only
export function countSettled(engine: string, kind: string, amount: bigint) {
  settledCounter.labels({ engine, kind }).inc(Number(amount))
}

export function getRegistry(): Registry {
  return registry
}
