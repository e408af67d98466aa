/**
 * ConversionGraph - Weighted graph of declared type conversions
 *
 * Each direct edge keeps the best reliability any parser declared for it.
 * Routes minimise the summed cost; a route is as reliable as its worst step.
 */

import { Option } from 'effect';
import {
  ConversionReliability,
  isBetterThan,
  worstOf,
} from './conversion-reliability';
import type { DataType } from './data-type';
import type { Conversion } from './value-parser';

export interface ConversionRoute {
  readonly steps: ReadonlyArray<DataType>;
  readonly cost: number;
  readonly reliability: ConversionReliability;
}

const routeKey = (from: string, to: string) => `${from}->${to}`;

export class ConversionGraph {
  private readonly edges = new Map<
    string,
    Map<string, { readonly to: DataType; reliability: ConversionReliability }>
  >();
  private readonly types = new Map<string, DataType>();
  private readonly routeCache = new Map<
    string,
    Option.Option<ConversionRoute>
  >();

  add(conversion: Conversion): void {
    this.types.set(conversion.from.name, conversion.from);
    this.types.set(conversion.to.name, conversion.to);

    let outgoing = this.edges.get(conversion.from.name);
    if (!outgoing) {
      outgoing = new Map();
      this.edges.set(conversion.from.name, outgoing);
    }

    const existing = outgoing.get(conversion.to.name);
    if (!existing) {
      outgoing.set(conversion.to.name, {
        to: conversion.to,
        reliability: conversion.reliability,
      });
    } else if (isBetterThan(conversion.reliability, existing.reliability)) {
      existing.reliability = conversion.reliability;
    }

    this.routeCache.clear();
  }

  addAll(conversions: Iterable<Conversion>): void {
    for (const conversion of conversions) {
      this.add(conversion);
    }
  }

  directReliability(
    from: DataType,
    to: DataType
  ): Option.Option<ConversionReliability> {
    return Option.fromNullable(
      this.edges.get(from.name)?.get(to.name)?.reliability
    );
  }

  /**
   * Cheapest route from `from` to `to`; a type reaches itself perfectly.
   */
  findRoute(from: DataType, to: DataType): Option.Option<ConversionRoute> {
    const key = routeKey(from.name, to.name);
    const cached = this.routeCache.get(key);
    if (cached) return cached;

    const route = this.search(from, to);
    this.routeCache.set(key, route);
    return route;
  }

  reliability(
    from: DataType,
    to: DataType
  ): Option.Option<ConversionReliability> {
    return Option.map(this.findRoute(from, to), (route) => route.reliability);
  }

  findOptimalTargetType(
    from: DataType,
    candidates: ReadonlyArray<DataType>
  ): Option.Option<DataType> {
    let best: Option.Option<{ type: DataType; cost: number }> = Option.none();
    for (const candidate of candidates) {
      const route = this.findRoute(from, candidate);
      if (Option.isNone(route)) continue;
      if (Option.isNone(best) || route.value.cost < best.value.cost) {
        best = Option.some({ type: candidate, cost: route.value.cost });
      }
    }
    return Option.map(best, (entry) => entry.type);
  }

  private search(from: DataType, to: DataType): Option.Option<ConversionRoute> {
    if (from.name === to.name) {
      return Option.some({
        steps: [from],
        cost: 0,
        reliability: ConversionReliability.PERFECT,
      });
    }

    const distance = new Map<string, number>([[from.name, 0]]);
    const previous = new Map<string, string>();
    const settled = new Set<string>();

    for (;;) {
      let current: string | undefined;
      let currentDistance = Infinity;
      for (const [name, d] of distance) {
        if (!settled.has(name) && d < currentDistance) {
          current = name;
          currentDistance = d;
        }
      }
      if (current === undefined) return Option.none();
      if (current === to.name) break;
      settled.add(current);

      for (const [next, edge] of this.edges.get(current) ?? []) {
        const candidate = currentDistance + edge.reliability.cost;
        if (candidate < (distance.get(next) ?? Infinity)) {
          distance.set(next, candidate);
          previous.set(next, current);
        }
      }
    }

    const names: string[] = [to.name];
    let step = previous.get(to.name);
    while (step !== undefined) {
      names.unshift(step);
      step = previous.get(step);
    }

    let reliability: ConversionReliability = ConversionReliability.PERFECT;
    for (let i = 0; i + 1 < names.length; i++) {
      const edge = this.edges.get(names[i] ?? '')?.get(names[i + 1] ?? '');
      if (edge) reliability = worstOf(reliability, edge.reliability);
    }

    return Option.some({
      steps: names.map((name) => this.types.get(name) ?? { name }),
      cost: distance.get(to.name) ?? 0,
      reliability,
    });
  }
}
