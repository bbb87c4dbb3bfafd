import { hasFile, nearestFile } from './layout.js';
import type { ProjectLayout } from './layout.js';
import { metricPrefix, sibling } from './paths.js';
import type { PlanBuilder } from './plan-builder.js';
import type { GenerationContext, InstrumentationGenerator } from './types.js';

type PythonFlavor = 'flask' | 'fastapi' | 'plain';

function flavorOf(framework: string): PythonFlavor {
  if (framework === 'Flask') return 'flask';
  if (framework === 'FastAPI') return 'fastapi';
  return 'plain';
}

const APP_ANCHORS: Record<PythonFlavor, string> = {
  flask: 'app = Flask(__name__)',
  fastapi: 'app = FastAPI(',
  plain: 'if __name__ == "__main__":',
};

const INSTRUMENTATION_PACKAGES: Record<PythonFlavor, string[]> = {
  flask: ['opentelemetry-instrumentation-flask>=0.41b0'],
  fastapi: ['opentelemetry-instrumentation-fastapi>=0.41b0'],
  plain: [],
};

function metricDefinitions(service: string): string {
  const prefix = metricPrefix(service);
  return `http_requests_total = Counter(
    "${prefix}_http_requests_total",
    "Total HTTP requests",
    ["method", "endpoint", "status"],
)

http_request_duration_seconds = Histogram(
    "${prefix}_http_request_duration_seconds",
    "HTTP request duration in seconds",
    ["method", "endpoint", "status"],
)
`;
}

function metricsModule(flavor: PythonFlavor, service: string): string {
  switch (flavor) {
    case 'flask':
      return `import time

from flask import Response, request
from prometheus_client import CONTENT_TYPE_LATEST, Counter, Histogram, generate_latest

${metricDefinitions(service)}

def setup_metrics(app):
    """Record request count and latency, and serve /metrics."""

    @app.before_request
    def _start_timer():
        request.start_time = time.perf_counter()

    @app.after_request
    def _record(response):
        endpoint = request.endpoint or "unknown"
        labels = (request.method, endpoint, str(response.status_code))
        http_requests_total.labels(*labels).inc()
        http_request_duration_seconds.labels(*labels).observe(
            time.perf_counter() - request.start_time
        )
        return response

    @app.route("/metrics")
    def metrics():
        return Response(generate_latest(), mimetype=CONTENT_TYPE_LATEST)
`;
    case 'fastapi':
      return `import time

from fastapi import Request
from prometheus_client import Counter, Histogram, make_asgi_app

${metricDefinitions(service)}

def setup_metrics(app):
    """Record request count and latency, and mount /metrics."""

    @app.middleware("http")
    async def _record(request: Request, call_next):
        start = time.perf_counter()
        response = await call_next(request)
        labels = (request.method, request.url.path, str(response.status_code))
        http_requests_total.labels(*labels).inc()
        http_request_duration_seconds.labels(*labels).observe(time.perf_counter() - start)
        return response

    app.mount("/metrics", make_asgi_app())
`;
    case 'plain':
      return `from prometheus_client import Counter, Histogram, start_http_server

${metricDefinitions(service)}

def start_metrics_server(port=8000):
    """Serve /metrics on its own port."""
    start_http_server(port)
`;
  }
}

function withScheme(endpoint: string): string {
  return /^[a-z]+:\/\//i.test(endpoint) ? endpoint : `http://${endpoint}`;
}

function tracingModule(flavor: PythonFlavor, service: string, endpoint: string): string {
  const instrumentorImport: Record<PythonFlavor, string> = {
    flask: 'from opentelemetry.instrumentation.flask import FlaskInstrumentor\n',
    fastapi: 'from opentelemetry.instrumentation.fastapi import FastAPIInstrumentor\n',
    plain: '',
  };
  const instrument: Record<PythonFlavor, string> = {
    flask: '    FlaskInstrumentor().instrument_app(app)\n',
    fastapi: '    FastAPIInstrumentor.instrument_app(app)\n',
    plain: '',
  };
  const signature = flavor === 'plain' ? 'init_tracer()' : 'init_tracer(app)';

  return `from opentelemetry import trace
from opentelemetry.exporter.otlp.proto.grpc.trace_exporter import OTLPSpanExporter
${instrumentorImport[flavor]}from opentelemetry.sdk.resources import Resource
from opentelemetry.sdk.trace import TracerProvider
from opentelemetry.sdk.trace.export import BatchSpanProcessor


def ${signature}:
    """Install the global tracer provider exporting to the collector."""
    resource = Resource.create({"service.name": "${service}"})
    provider = TracerProvider(resource=resource)
    exporter = OTLPSpanExporter(endpoint="${withScheme(endpoint)}", insecure=True)
    provider.add_span_processor(BatchSpanProcessor(exporter))
    trace.set_tracer_provider(provider)
${instrument[flavor]}`;
}

/** Import line plus call, indented under the main guard for plain scripts. */
function wiring(flavor: PythonFlavor, module: string, fn: string, call: string) {
  const pad = flavor === 'plain' ? '    ' : '';
  return { importLine: `${pad}from ${module} import ${fn}`, callLine: `${pad}${call}` };
}

const PROJECT_FILES = ['pyproject.toml', 'setup.py', 'Pipfile'];

/**
 * The requirements.txt closest to `entry`. Without one, a new file goes in
 * the directory of the nearest project file, or beside the entry.
 */
function requirementsFor(entry: string, layout: ProjectLayout | undefined): string {
  if (!layout) return 'requirements.txt';
  const existing = nearestFile(layout, 'requirements.txt', entry);
  if (existing) return existing;
  const project = PROJECT_FILES.map((name) => nearestFile(layout, name, entry)).find(Boolean);
  return sibling(project ?? entry, 'requirements.txt');
}

function addRequirements(
  plan: PlanBuilder,
  entry: string,
  layout: ProjectLayout | undefined,
  requirements: readonly string[],
): void {
  const path = requirementsFor(entry, layout);
  const content = requirements.join('\n');
  if (hasFile(layout, path) || plan.has(path)) plan.append(path, content);
  else plan.create(path, `${content}\n`);
}

export const pythonGenerator: InstrumentationGenerator = {
  language: 'python',
  defaultEntry: 'app.py',
  entryFromCandidates: true,

  addMetrics(plan, { service, framework, entry, layout }: GenerationContext) {
    const flavor = flavorOf(framework);
    const { importLine, callLine } =
      flavor === 'plain'
        ? wiring(flavor, 'metrics_config', 'start_metrics_server', 'start_metrics_server()')
        : wiring(flavor, 'metrics_config', 'setup_metrics', 'setup_metrics(app)');

    addRequirements(plan, entry, layout, ['prometheus-client>=0.19.0']);
    plan
      .create(sibling(entry, 'metrics_config.py'), metricsModule(flavor, service))
      .append(entry, importLine, APP_ANCHORS[flavor])
      .modify(entry, callLine, importLine.trim());
  },

  addTracing(plan, { service, framework, collectorEndpoint, entry, layout }: GenerationContext) {
    const flavor = flavorOf(framework);
    const { importLine, callLine } = wiring(
      flavor,
      'otel_config',
      'init_tracer',
      flavor === 'plain' ? 'init_tracer()' : 'init_tracer(app)',
    );
    const requirements = [
      'opentelemetry-api>=1.20.0',
      'opentelemetry-sdk>=1.20.0',
      'opentelemetry-exporter-otlp-proto-grpc>=1.20.0',
      ...INSTRUMENTATION_PACKAGES[flavor],
    ];

    addRequirements(plan, entry, layout, requirements);
    plan
      .create(sibling(entry, 'otel_config.py'), tracingModule(flavor, service, collectorEndpoint))
      .append(entry, importLine, APP_ANCHORS[flavor])
      .modify(entry, callLine, importLine.trim());
  },
};
