// app/api/drivers/route.ts
// Default driver definitions grouped by category, plus dependency diagnostics

import { NextResponse } from 'next/server';
import { toErrorPayload } from '@/lib/api-response';
import { createDefaultFuelModel, DRIVER_CATEGORIES, summarizeDriver } from '@/lib/drivers';

export const dynamic = 'force-dynamic';

export async function GET(request: Request) {
  try {
    const { searchParams } = new URL(request.url);
    const category = searchParams.get('category')?.trim();

    const model = createDefaultFuelModel();
    const categories = DRIVER_CATEGORIES.filter((c) => !category || c === category);

    const grouped = categories
      .map((c) => ({
        category: c,
        drivers: model.registry
          .byCategory(c)
          .sort((a, b) => a.displayOrder - b.displayOrder)
          .map(summarizeDriver),
      }))
      .filter((group) => group.drivers.length > 0);

    return NextResponse.json({
      success: true,
      data: {
        categories: grouped,
        calculationOrder: model.calculationOrder,
        issues: model.registry.validateDependencies(),
      },
    });
  } catch (error) {
    console.error('[API] Drivers error:', error);
    const { status, body } = toErrorPayload(error, 'internal');
    return NextResponse.json(body, { status });
  }
}
