// tests/unit/java/edits.test.ts
import { describe, expect, it } from 'vitest';
import { removeDeclaration, spliceOut } from '../../../src/java/edits.js';

function removeText(source: string, text: string): string {
  const start = source.indexOf(text);
  return removeDeclaration(source, start, start + text.length);
}

describe('removeDeclaration', () => {
  const IMPORTS = 'package com.example;\n\nimport java.util.List;\nimport java.io.IOException;\n\npublic class A {}\n';

  it('removes a whole line', () => {
    expect(removeText(IMPORTS, 'import java.io.IOException;')).toBe(
      'package com.example;\n\nimport java.util.List;\n\npublic class A {}\n',
    );
  });

  it('collapses the blank lines around a removed line', () => {
    const once = removeText(IMPORTS, 'import java.util.List;');
    expect(once).toBe('package com.example;\n\nimport java.io.IOException;\n\npublic class A {}\n');
    expect(removeText(once, 'import java.io.IOException;')).toBe('package com.example;\n\npublic class A {}\n');
  });

  it('drops the blank line left before a closing brace', () => {
    const source = 'class A {\n    void a() {}\n\n    void b() {\n        a();\n    }\n}\n';
    expect(removeText(source, 'void b() {\n        a();\n    }')).toBe('class A {\n    void a() {}\n}\n');
  });

  it('keeps CRLF line endings intact', () => {
    const source = 'class A {\r\n    int x;\r\n    int y;\r\n}\r\n';
    expect(removeText(source, 'int x;')).toBe('class A {\r\n    int y;\r\n}\r\n');
  });

  it('splices a range that shares its line with other code', () => {
    expect(removeText('int a; int b;', 'int b;')).toBe('int a; ');
  });
});

describe('spliceOut', () => {
  it('removes exactly the range', () => {
    expect(spliceOut('int a, b;', 5, 8)).toBe('int a;');
  });
});
