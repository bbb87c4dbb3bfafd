import { findFile, hasFile } from './layout.js';
import type { ProjectLayout } from './layout.js';
import { dirOf, metricPrefix } from './paths.js';
import type { PlanBuilder } from './plan-builder.js';
import type { GenerationContext, InstrumentationGenerator } from './types.js';

const RESOURCES = 'src/main/resources';
const SOURCES = 'src/main/java';
const APPLICATION_PROPERTIES = `${RESOURCES}/application.properties`;
const NAME_ANCHOR = 'spring.application.name';
const FALLBACK_PACKAGE = 'observability';

function dependency(groupId: string, artifactId: string, version?: string): string {
  return [
    '        <dependency>',
    `            <groupId>${groupId}</groupId>`,
    `            <artifactId>${artifactId}</artifactId>`,
    ...(version ? [`            <version>${version}</version>`] : []),
    '        </dependency>',
  ].join('\n');
}

/**
 * Package for generated classes: `observability` under the package of the
 * `*Application.java` class, so component scanning picks them up.
 */
export function observabilityPackage(layout: ProjectLayout | undefined): string {
  const app =
    layout && findFile(layout, (file) => file.startsWith(`${SOURCES}/`) && file.endsWith('Application.java'));
  if (!app) return FALLBACK_PACKAGE;
  const base = dirOf(app).slice(SOURCES.length + 1).replace(/\//g, '.');
  return base ? `${base}.${FALLBACK_PACKAGE}` : FALLBACK_PACKAGE;
}

function sourcePath(pkg: string, className: string): string {
  return `${SOURCES}/${pkg.replace(/\./g, '/')}/${className}.java`;
}

const METRICS_PROPERTIES = `# Prometheus metrics through Spring Boot Actuator
management.endpoints.web.exposure.include=health,prometheus,metrics
management.endpoint.prometheus.enabled=true
management.prometheus.metrics.export.enabled=true
management.metrics.tags.application=\${spring.application.name}
`;

function metricsFilter(pkg: string, service: string): string {
  const prefix = metricPrefix(service);
  return `package ${pkg};

import io.micrometer.core.instrument.Counter;
import io.micrometer.core.instrument.MeterRegistry;
import io.micrometer.core.instrument.Timer;
import jakarta.servlet.FilterChain;
import jakarta.servlet.ServletException;
import jakarta.servlet.http.HttpServletRequest;
import jakarta.servlet.http.HttpServletResponse;
import java.io.IOException;
import java.util.concurrent.TimeUnit;
import org.springframework.stereotype.Component;
import org.springframework.web.filter.OncePerRequestFilter;

/** Counts HTTP requests and records their latency by method, endpoint and status. */
@Component
public class HttpMetricsFilter extends OncePerRequestFilter {

    private final MeterRegistry registry;

    public HttpMetricsFilter(MeterRegistry registry) {
        this.registry = registry;
    }

    @Override
    protected void doFilterInternal(HttpServletRequest request, HttpServletResponse response, FilterChain chain)
            throws ServletException, IOException {
        long start = System.nanoTime();
        try {
            chain.doFilter(request, response);
        } finally {
            String method = request.getMethod();
            String endpoint = request.getRequestURI();
            String status = String.valueOf(response.getStatus());
            Counter.builder("${prefix}_http_requests_total")
                    .description("Total number of HTTP requests")
                    .tags("method", method, "endpoint", endpoint, "status", status)
                    .register(registry)
                    .increment();
            Timer.builder("${prefix}_http_request_duration_seconds")
                    .description("HTTP request duration in seconds")
                    .tags("method", method, "endpoint", endpoint, "status", status)
                    .publishPercentileHistogram()
                    .register(registry)
                    .record(System.nanoTime() - start, TimeUnit.NANOSECONDS);
        }
    }
}
`;
}

function tracingProperties(service: string, endpoint: string): string {
  const url = /^[a-z]+:\/\//i.test(endpoint) ? endpoint : `http://${endpoint}`;
  return `# OpenTelemetry tracing, read by OpenTelemetryConfig
otel.service.name=${service}
otel.exporter.otlp.endpoint=${url}
`;
}

function tracingConfig(pkg: string): string {
  return `package ${pkg};

import io.opentelemetry.api.OpenTelemetry;
import io.opentelemetry.api.common.AttributeKey;
import io.opentelemetry.api.common.Attributes;
import io.opentelemetry.exporter.otlp.trace.OtlpGrpcSpanExporter;
import io.opentelemetry.sdk.OpenTelemetrySdk;
import io.opentelemetry.sdk.resources.Resource;
import io.opentelemetry.sdk.trace.SdkTracerProvider;
import io.opentelemetry.sdk.trace.export.BatchSpanProcessor;
import org.springframework.beans.factory.annotation.Value;
import org.springframework.context.annotation.Bean;
import org.springframework.context.annotation.Configuration;

/** Installs the global OpenTelemetry SDK, exporting spans to the collector. */
@Configuration
public class OpenTelemetryConfig {

    @Bean(destroyMethod = "close")
    public SdkTracerProvider sdkTracerProvider(
            @Value("\${otel.service.name}") String serviceName,
            @Value("\${otel.exporter.otlp.endpoint}") String endpoint) {
        OtlpGrpcSpanExporter exporter = OtlpGrpcSpanExporter.builder().setEndpoint(endpoint).build();
        Resource resource = Resource.getDefault()
                .merge(Resource.create(Attributes.of(AttributeKey.stringKey("service.name"), serviceName)));
        return SdkTracerProvider.builder()
                .setResource(resource)
                .addSpanProcessor(BatchSpanProcessor.builder(exporter).build())
                .build();
    }

    @Bean
    public OpenTelemetry openTelemetry(SdkTracerProvider tracerProvider) {
        return OpenTelemetrySdk.builder().setTracerProvider(tracerProvider).buildAndRegisterGlobal();
    }
}
`;
}

/** `spring.config.import` entries are indexed so both halves can coexist. */
function configImport(index: number, file: string): string {
  return `spring.config.import[${index}]=optional:classpath:${file}`;
}

/** Imports a properties file from application.properties, creating it when the tree has none. */
function importProperties(plan: PlanBuilder, entry: string, layout: ProjectLayout | undefined, line: string): void {
  if (hasFile(layout, entry)) plan.append(entry, line, NAME_ANCHOR);
  else if (plan.has(entry)) plan.append(entry, line);
  else plan.create(entry, `${line}\n`);
}

export const javaGenerator: InstrumentationGenerator = {
  language: 'java',
  defaultEntry: APPLICATION_PROPERTIES,
  entryFromCandidates: false,

  addMetrics(plan, { service, entry, layout }: GenerationContext) {
    const pkg = observabilityPackage(layout);
    const deps = [
      '        <!-- Prometheus metrics -->',
      dependency('org.springframework.boot', 'spring-boot-starter-actuator'),
      dependency('io.micrometer', 'micrometer-registry-prometheus', '1.12.0'),
    ];
    plan
      .append('pom.xml', deps.join('\n'), '<dependencies>')
      .create(`${RESOURCES}/application-metrics.properties`, METRICS_PROPERTIES)
      .create(sourcePath(pkg, 'HttpMetricsFilter'), metricsFilter(pkg, service));
    importProperties(plan, entry, layout, configImport(0, 'application-metrics.properties'));
  },

  addTracing(plan, { service, collectorEndpoint, entry, layout }: GenerationContext) {
    const pkg = observabilityPackage(layout);
    const deps = [
      '        <!-- OpenTelemetry tracing -->',
      dependency('io.opentelemetry', 'opentelemetry-sdk', '1.32.0'),
      dependency('io.opentelemetry', 'opentelemetry-exporter-otlp', '1.32.0'),
    ];
    const index = plan.has(`${RESOURCES}/application-metrics.properties`) ? 1 : 0;
    plan
      .append('pom.xml', deps.join('\n'), '<dependencies>')
      .create(`${RESOURCES}/application-otel.properties`, tracingProperties(service, collectorEndpoint))
      .create(sourcePath(pkg, 'OpenTelemetryConfig'), tracingConfig(pkg));
    importProperties(plan, entry, layout, configImport(index, 'application-otel.properties'));
  },
};
