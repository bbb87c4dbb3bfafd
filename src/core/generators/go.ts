import { baseName } from '../walker.js';
import { nearestFile } from './layout.js';
import type { ProjectLayout } from './layout.js';
import { dirOf, metricPrefix, sibling } from './paths.js';
import type { GenerationContext, InstrumentationGenerator } from './types.js';

interface GoRouter {
  anchor: string;
  metricsRoute: string;
  /** Tracing middleware import and registration; absent for plain net/http. */
  middleware?: { module: string; version: string; use: (service: string) => string };
}

const CONTRIB = 'go.opentelemetry.io/contrib/instrumentation';

const ROUTERS: Partial<Record<string, GoRouter>> = {
  Gin: {
    anchor: 'router := gin.Default()',
    metricsRoute: 'router.GET("/metrics", gin.WrapH(promhttp.Handler()))',
    middleware: {
      module: `${CONTRIB}/github.com/gin-gonic/gin/otelgin`,
      version: 'v0.46.1',
      use: (service) => `router.Use(otelgin.Middleware("${service}"))`,
    },
  },
  Echo: {
    anchor: 'e := echo.New()',
    metricsRoute: 'e.GET("/metrics", echo.WrapHandler(promhttp.Handler()))',
    middleware: {
      module: `${CONTRIB}/github.com/labstack/echo/otelecho`,
      version: 'v0.46.1',
      use: (service) => `e.Use(otelecho.Middleware("${service}"))`,
    },
  },
  Chi: {
    anchor: 'r := chi.NewRouter()',
    metricsRoute: 'r.Handle("/metrics", promhttp.Handler())',
    middleware: {
      module: `${CONTRIB}/net/http/otelhttp`,
      version: 'v0.46.1',
      use: (service) =>
        `r.Use(func(next http.Handler) http.Handler { return otelhttp.NewHandler(next, "${service}") })`,
    },
  },
  'Gorilla Mux': {
    anchor: 'r := mux.NewRouter()',
    metricsRoute: 'r.Handle("/metrics", promhttp.Handler())',
    middleware: {
      module: `${CONTRIB}/github.com/gorilla/mux/otelmux`,
      version: 'v0.46.1',
      use: (service) => `r.Use(otelmux.Middleware("${service}"))`,
    },
  },
};

const NET_HTTP: GoRouter = {
  anchor: 'func main() {',
  metricsRoute: 'http.Handle("/metrics", promhttp.Handler())',
};

function routerFor(framework: string): GoRouter {
  return ROUTERS[framework] ?? NET_HTTP;
}

function indent(lines: readonly string[]): string {
  return lines.map((line) => `\t${line}`).join('\n');
}

function metricsModule(service: string): string {
  const prefix = metricPrefix(service);
  return `package metrics

import (
	"github.com/prometheus/client_golang/prometheus"
)

var (
	HTTPRequestsTotal = prometheus.NewCounterVec(
		prometheus.CounterOpts{
			Name: "${prefix}_http_requests_total",
			Help: "Total number of HTTP requests",
		},
		[]string{"method", "endpoint", "status"},
	)

	HTTPRequestDuration = prometheus.NewHistogramVec(
		prometheus.HistogramOpts{
			Name:    "${prefix}_http_request_duration_seconds",
			Help:    "HTTP request duration in seconds",
			Buckets: prometheus.DefBuckets,
		},
		[]string{"method", "endpoint", "status"},
	)
)

func init() {
	prometheus.MustRegister(HTTPRequestsTotal, HTTPRequestDuration)
}
`;
}

function goPackageFor(entry: string): string {
  const dir = dirOf(entry);
  if (baseName(entry) === 'main.go' || dir === '') return 'main';
  return baseName(dir).replace(/[^A-Za-z0-9_]/g, '_');
}

function tracingModule(pkg: string, service: string, endpoint: string): string {
  return `package ${pkg}

import (
	"context"
	"log"

	"go.opentelemetry.io/otel"
	"go.opentelemetry.io/otel/exporters/otlp/otlptrace/otlptracegrpc"
	"go.opentelemetry.io/otel/sdk/resource"
	sdktrace "go.opentelemetry.io/otel/sdk/trace"
	semconv "go.opentelemetry.io/otel/semconv/v1.21.0"
)

// setupTracing installs a global tracer provider that exports spans to the
// collector. The returned function flushes pending spans.
func setupTracing() func() {
	ctx := context.Background()
	exporter, err := otlptracegrpc.New(ctx,
		otlptracegrpc.WithEndpoint("${endpoint}"),
		otlptracegrpc.WithInsecure(),
	)
	if err != nil {
		log.Printf("tracing disabled: %v", err)
		return func() {}
	}

	tp := sdktrace.NewTracerProvider(
		sdktrace.WithBatcher(exporter),
		sdktrace.WithResource(resource.NewWithAttributes(
			semconv.SchemaURL,
			semconv.ServiceNameKey.String("${service}"),
		)),
	)
	otel.SetTracerProvider(tp)

	return func() {
		if err := tp.Shutdown(context.Background()); err != nil {
			log.Printf("tracer shutdown: %v", err)
		}
	}
}
`;
}

/** The go.mod of the module that holds `entry`. */
function moduleFileFor(entry: string, layout: ProjectLayout | undefined): string {
  return (layout && nearestFile(layout, 'go.mod', entry)) ?? 'go.mod';
}

export const goGenerator: InstrumentationGenerator = {
  language: 'go',
  defaultEntry: 'main.go',
  entryFromCandidates: true,

  addMetrics(plan, { service, framework, entry, layout }: GenerationContext) {
    const router = routerFor(framework);
    const goMod = moduleFileFor(entry, layout);
    plan
      .append(goMod, 'require github.com/prometheus/client_golang v1.19.1')
      .create(sibling(goMod, 'metrics/metrics.go'), metricsModule(service))
      .append(entry, '\t"github.com/prometheus/client_golang/prometheus/promhttp"', 'import (')
      .modify(entry, indent(['// Prometheus exposition endpoint', router.metricsRoute]), router.anchor);
  },

  addTracing(plan, { service, framework, collectorEndpoint, entry, layout }: GenerationContext) {
    const router = routerFor(framework);
    const requires = [
      'go.opentelemetry.io/otel v1.21.0',
      'go.opentelemetry.io/otel/sdk v1.21.0',
      'go.opentelemetry.io/otel/exporters/otlp/otlptrace/otlptracegrpc v1.21.0',
    ];
    if (router.middleware) requires.push(`${router.middleware.module} ${router.middleware.version}`);

    plan
      .append(moduleFileFor(entry, layout), ['require (', indent(requires), ')'].join('\n'))
      .create(
        sibling(entry, 'otel_tracing.go'),
        tracingModule(goPackageFor(entry), service, collectorEndpoint),
      );

    const wiring = ['shutdownTracing := setupTracing()', 'defer shutdownTracing()'];
    if (router.middleware) {
      plan.append(entry, `\t"${router.middleware.module}"`, 'import (');
      wiring.push(router.middleware.use(service));
    }
    plan.modify(entry, indent(wiring), router.anchor);
  },
};
