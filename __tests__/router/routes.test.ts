import { describe, expect, it } from 'vitest';
import { createMemoryHistory, createRouter } from 'vue-router';
import routes from 'src/router/routes';
import { ELECTRICITY_PAGE_ID, EMISSIONS_PAGE_ID } from 'src/pages/registry';

const router = createRouter({ history: createMemoryHistory(), routes });

describe('routes', () => {
  it('routes every registered page', () => {
    expect(router.resolve('/').name).toBe(EMISSIONS_PAGE_ID);
    expect(router.resolve('/electricity').name).toBe(ELECTRICITY_PAGE_ID);
  });

  it('sends unknown paths to the not-found page', () => {
    const route = router.resolve('/no-such-page');
    expect(route.name).toBeUndefined();
    expect(route.matched).toHaveLength(1);
  });
});
