// packages/core/src/cleanup/classifier.ts — Structural eligibility rules per symbol kind

import type { CleanupCategory } from '../types/cleanup.js';
import type { AnnotationEffect, AnnotationPolicy, CleanupPolicy } from '../types/config.js';
import type { ModelSnapshot } from '../types/model.js';
import type { ClassSymbol, CodeSymbol, ImportSymbol, MethodSymbol } from '../types/symbols.js';

export interface ClassificationContext {
  policy: CleanupPolicy;
  /** Qualified names of the classes treated as controllers. */
  controllers: ReadonlySet<string>;
}

function simpleName(name: string): string {
  return name.slice(name.lastIndexOf('.') + 1);
}

/**
 * `Controller` matches a policy key `org.springframework.stereotype.Controller`
 * and the other way round; two qualified names must match exactly.
 */
function annotationMatches(annotation: string, key: string): boolean {
  if (annotation === key) return true;
  if (annotation.includes('.') && key.includes('.')) return false;
  return simpleName(annotation) === simpleName(key);
}

export function annotationEffects(annotations: readonly string[], policy: AnnotationPolicy): Set<AnnotationEffect> {
  const effects = new Set<AnnotationEffect>();
  for (const annotation of annotations) {
    for (const [key, effect] of Object.entries(policy)) {
      if (annotationMatches(annotation, key)) effects.add(effect);
    }
  }
  return effects;
}

export function hasEffect(symbol: CodeSymbol, effect: AnnotationEffect, policy: AnnotationPolicy): boolean {
  return annotationEffects(symbol.annotations, policy).has(effect);
}

function nameSuggestsController(name: string): boolean {
  return name.includes('Controller');
}

/**
 * Controller classes across the whole snapshot. Without any annotated
 * controller, the name fallback (when enabled) picks classes named `*Controller*`.
 */
export function findControllers(snapshot: ModelSnapshot, policy: CleanupPolicy): Set<string> {
  const classes: ClassSymbol[] = snapshot.listFiles().flatMap((file) => snapshot.getSymbols(file).classes);
  const annotated = classes.filter((c) => hasEffect(c, 'controller', policy.annotations));
  if (annotated.length > 0 || !policy.controllerNameFallback) {
    return new Set(annotated.map((c) => c.qualifiedName));
  }
  return new Set(classes.filter((c) => nameSuggestsController(c.name)).map((c) => c.qualifiedName));
}

export function createClassificationContext(snapshot: ModelSnapshot, policy: CleanupPolicy): ClassificationContext {
  return { policy, controllers: findControllers(snapshot, policy) };
}

export function isDeprecatedMethod(method: MethodSymbol, policy: AnnotationPolicy): boolean {
  return (
    hasEffect(method, 'deprecated', policy) ||
    method.hasDocDeprecatedTag ||
    method.name.toLowerCase().includes('deprecated')
  );
}

/** `java.lang.String`, but not `java.lang.reflect.Method`. */
export function isJavaLangImport(symbol: ImportSymbol): boolean {
  // Narrower than a plain `java.lang.` prefix test: subpackages such as
  // java.lang.reflect are not implicitly imported, so they stay subject to the unused check.
  if (symbol.isStatic || symbol.isWildcard) return false;
  const prefix = 'java.lang.';
  return symbol.qualifiedName.startsWith(prefix) && !symbol.qualifiedName.slice(prefix.length).includes('.');
}

export function isControllerClass(symbol: ClassSymbol, context: ClassificationContext): boolean {
  return (
    context.controllers.has(symbol.qualifiedName) ||
    hasEffect(symbol, 'controller', context.policy.annotations) ||
    nameSuggestsController(symbol.name)
  );
}

/**
 * Category a symbol would be removed under, before any reference counting.
 * Null means the symbol is never a candidate.
 */
export function classify(symbol: CodeSymbol, context: ClassificationContext): CleanupCategory | null {
  const { policy } = context;
  if (hasEffect(symbol, 'preserve', policy.annotations)) return null;

  switch (symbol.kind) {
    case 'method': {
      if (symbol.isConstructor || symbol.declaredInInterface || symbol.overrides) return null;
      if (symbol.containingClass === null) return null;
      if (!context.controllers.has(symbol.containingClass)) return null;
      return isDeprecatedMethod(symbol, policy.annotations) ? 'deprecated-method' : null;
    }
    case 'import':
      return symbol.isWildcard ? null : 'import';
    case 'field': {
      if (symbol.modifiers.includes('public') || symbol.modifiers.includes('static')) return null;
      if (symbol.annotations.length > 0) return null;
      if (policy.fieldMode === 'final-private') {
        if (!symbol.modifiers.includes('final') || !symbol.modifiers.includes('private')) return null;
      }
      return 'field';
    }
    case 'class': {
      if (isControllerClass(symbol, context)) return null;
      if (symbol.methodCount > 0) return null;
      if (policy.classMode === 'no-methods') return 'class';
      return symbol.fieldCount === 0 && symbol.nestedClassCount === 0 ? 'class' : null;
    }
  }
}

/** Methods the liveness worklist may mark dead; seeds are checked by `classify` instead. */
export function isTransitivelyRemovable(method: MethodSymbol, policy: AnnotationPolicy): boolean {
  if (method.declaredInInterface || method.overrides || method.isConstructor) return false;
  const effects = annotationEffects(method.annotations, policy);
  return !effects.has('preserve') && !effects.has('entry-point');
}
