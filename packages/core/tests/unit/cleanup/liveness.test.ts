// tests/unit/cleanup/liveness.test.ts
import { describe, expect, it } from 'vitest';
import { LivenessAnalyzer } from '../../../src/cleanup/liveness.js';
import { DEFAULT_POLICY } from '../../../src/config/defaults.js';
import { JavaCodeModel } from '../../../src/java/java-model.js';
import { MemorySourceStore } from '../../../src/java/source-store.js';

const SHOP = `package app;

@RestController
public class ShopController {
    @Deprecated
    public void a() { b(); }

    private void b() { c(); }

    private void c() {}

    public void live() { shared(); }

    private void shared() {}

    @Deprecated
    public void alsoOld() { shared(); endpoint(); }

    @GetMapping("/x")
    public void endpoint() {}

    /** @deprecated still called */
    public void stillUsed() {}

    public void caller() { stillUsed(); }
}
`;

const HOLDER = `package app;

import java.util.List;
import java.io.IOException;
import java.lang.String;

public class Holder {
    private List<String> items;

    public List<String> items() { return items; }
}
`;

const CONFIG = `package app;

public class Config {
    private final String x = "a";
    @Deprecated
    private final String y = "b";
    public String z = "c";
}
`;

async function analyzer(files: Record<string, string>): Promise<LivenessAnalyzer> {
  const snapshot = await new JavaCodeModel(new MemorySourceStore(files)).readSnapshot();
  return new LivenessAnalyzer(snapshot, DEFAULT_POLICY);
}

describe('LivenessAnalyzer: deprecated controller methods', () => {
  it('finds deprecated controller methods with no callers', async () => {
    const liveness = await analyzer({ 'src/ShopController.java': SHOP });
    expect(liveness.findUnusedDeprecatedMethods(['src/ShopController.java']).map((m) => m.name)).toEqual(['a', 'alsoOld']);
  });

  it('follows the call chain from dead methods', async () => {
    const liveness = await analyzer({ 'src/ShopController.java': SHOP });
    const seeds = liveness.findUnusedDeprecatedMethods(['src/ShopController.java']);
    // shared() keeps a caller in live(); endpoint() is a framework entry point
    expect(liveness.findTransitivelyUnusedMethods(seeds).map((m) => m.name)).toEqual(['b', 'c']);
  });

  it('does not count a method calling itself', async () => {
    const liveness = await analyzer({
      'src/LoopController.java':
        'package app;\n\n@Controller\nclass LoopController {\n    @Deprecated\n    void spin() { spin(); }\n}\n',
    });
    expect(liveness.findUnusedDeprecatedMethods(['src/LoopController.java']).map((m) => m.name)).toEqual(['spin']);
  });

  it('summarises findings and totals', async () => {
    const liveness = await analyzer({ 'src/ShopController.java': SHOP });
    const analysis = liveness.analyze('deprecated-controllers', ['src/ShopController.java']);
    expect(analysis.totals).toEqual({ 'deprecated-method': 2, 'transitive-method': 2, import: 0, field: 0, class: 0 });
    expect(analysis.total).toBe(4);
    expect(analysis.findings.map((f) => f.file)).toEqual(['src/ShopController.java']);
  });

  it('looks for seeds in the given files only', async () => {
    const liveness = await analyzer({ 'src/ShopController.java': SHOP });
    expect(liveness.analyze('deprecated-controllers', []).total).toBe(0);
  });
});

describe('LivenessAnalyzer: marked-file candidates', () => {
  it('finds unused imports, including redundant java.lang ones', async () => {
    const liveness = await analyzer({ 'src/Holder.java': HOLDER });
    expect(liveness.findUnusedImports(['src/Holder.java']).map((i) => i.qualifiedName)).toEqual([
      'java.io.IOException',
      'java.lang.String',
    ]);
  });

  it('keeps used fields and fields with annotations', async () => {
    const liveness = await analyzer({ 'src/Holder.java': HOLDER, 'src/Config.java': CONFIG });
    expect(liveness.findUnusedFields(['src/Holder.java'])).toEqual([]);
    expect(liveness.findUnusedFields(['src/Config.java']).map((f) => f.name)).toEqual(['x']);
  });

  it('finds empty classes nobody refers to', async () => {
    const liveness = await analyzer({
      'src/Empty.java': 'package app;\n\nclass Empty {}\n',
      'src/Used.java': 'package app;\n\nclass Used {}\n',
      'src/User.java': 'package app;\n\nclass User { Used used() { return null; } }\n',
      'src/EmptyController.java': 'package app;\n\nclass EmptyController {}\n',
    });
    const files = ['src/Empty.java', 'src/EmptyController.java', 'src/Used.java', 'src/User.java'];
    expect(liveness.findEmptyClasses(files).map((c) => c.name)).toEqual(['Empty']);
  });

  it('reports marked-file findings per file, sorted', async () => {
    const liveness = await analyzer({ 'src/Holder.java': HOLDER, 'src/Config.java': CONFIG });
    const analysis = liveness.analyze('marked-files', ['src/Holder.java', 'src/Config.java']);
    expect(analysis.findings.map((f) => [f.file, f.imports.length, f.fields.length])).toEqual([
      ['src/Config.java', 0, 1],
      ['src/Holder.java', 2, 0],
    ]);
    expect(analysis.total).toBe(3);
  });
});
