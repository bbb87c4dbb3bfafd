import { dotnetClassifier } from '../../../src/core/classifiers/dotnet.js';
import { JAVA_RULES, javaClassifier } from '../../../src/core/classifiers/java.js';
import { RUST_RULES, rustClassifier } from '../../../src/core/classifiers/rust.js';
import { createSubstringAnalyzer } from '../../../src/core/classifiers/substring.js';
import { createScanContext } from '../../../src/core/context.js';
import { createTempRepo, removeTempRepo } from '../helpers/temp-repo.js';

const JAVA_SOURCE = `package com.example;

import io.micrometer.core.instrument.MeterRegistry;
import io.micrometer.core.instrument.Counter;

public class Orders {
    private final Counter created;

    public Orders(MeterRegistry registry) {
        // Timer.builder("unused")
        this.created = Counter.builder("orders_created").register(registry);
    }

    void place() {
        created.increment();
    }
}
`;

describe('createSubstringAnalyzer', () => {
  const analyze = createSubstringAnalyzer(JAVA_RULES);

  it('should require an import marker before counting usages', () => {
    const findings = analyze(JAVA_SOURCE);
    expect([...findings.imports]).toEqual(['metrics']);
    expect([...findings.usages.metrics]).toEqual(['MeterRegistry', 'Counter.builder(', '.increment(']);
    expect(findings.usages.tracing.size).toBe(0);
  });

  it('should not count import statements as usage', () => {
    const findings = createSubstringAnalyzer(RUST_RULES)('use prometheus::Registry;\nuse prometheus::TextEncoder::new(\n');
    expect(findings.imports.has('metrics')).toBe(true);
    expect(findings.usages.metrics.size).toBe(0);
  });

  it('should ignore markers that only appear in comments', () => {
    const findings = analyze('// import io.micrometer.core.instrument.MeterRegistry;\nMeterRegistry r;\n');
    expect(findings.imports.size).toBe(0);
  });
});

describe('manifest-driven classifiers', () => {
  let root: string;

  afterEach(async () => {
    await removeTempRepo(root);
  });

  it('should recognise Spring Boot from pom.xml', async () => {
    root = await createTempRepo({
      'pom.xml': '<project><artifactId>spring-boot-starter-web</artifactId></project>',
    });
    expect(javaClassifier.detect(['pom.xml'])).toBe(true);
    expect(await javaClassifier.detectFramework(root, ['pom.xml'])).toBe('Spring Boot');
  });

  it('should recognise ASP.NET Core from a root project file', async () => {
    root = await createTempRepo({ 'Api.csproj': '<Project Sdk="Microsoft.NET.Sdk.Web"></Project>' });
    expect(dotnetClassifier.detect(['Api.csproj'])).toBe(true);
    expect(dotnetClassifier.detect(['src/Api.csproj'])).toBe(false);
    expect(await dotnetClassifier.detectFramework(root, ['Api.csproj'])).toBe('ASP.NET Core');
  });

  it('should return null for a console .NET project', async () => {
    root = await createTempRepo({ 'Tool.csproj': '<Project Sdk="Microsoft.NET.Sdk"></Project>' });
    expect(await dotnetClassifier.detectFramework(root, ['Tool.csproj'])).toBeNull();
  });

  it('should recognise Axum from Cargo.toml', async () => {
    root = await createTempRepo({ 'Cargo.toml': '[dependencies]\naxum = "0.7"\n' });
    expect(await rustClassifier.detectFramework(root, ['Cargo.toml'])).toBe('Axum');
  });

  it('should classify Java sources', async () => {
    root = await createTempRepo({ 'pom.xml': '<project/>', 'src/main/java/Orders.java': JAVA_SOURCE });
    const output = await javaClassifier.classify(
      root,
      ['pom.xml', 'src/main/java/Orders.java'],
      createScanContext(),
    );
    expect(output.files).toEqual({ metrics: ['src/main/java/Orders.java'], tracing: [] });
    expect(output.patterns.metrics).toEqual(['MeterRegistry', 'Counter.builder(', '.increment(']);
  });
});
