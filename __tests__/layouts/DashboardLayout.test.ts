import { afterEach, describe, expect, it, vi } from 'vitest';
import { fireEvent, render, screen } from '@testing-library/vue';
import { createPinia } from 'pinia';
import { defineComponent, h } from 'vue';
import DashboardLayout from 'src/layouts/DashboardLayout';
import { createDashboardI18n } from 'src/boot/i18n';
import { RouterLinkStub } from '../components/stubs';

const service = vi.hoisted(() => ({
  getEmissionsForecast: vi.fn(),
  getElectricityForecast: vi.fn(),
  getVersion: vi.fn(),
}));
vi.mock('services/forecastService', () => ({ forecastService: service }));

const config = vi.hoisted(() => ({
  regions: ['Espoo', 'Helsinki'],
  setCurrentRegion: vi.fn(() => true),
}));
vi.mock('src/utils/dashboardConfig', () => ({
  getAvailableRegions: () => config.regions,
  getCurrentRegion: () => 'Helsinki',
  setCurrentRegion: config.setCurrentRegion,
}));

const RouterViewStub = defineComponent({
  name: 'RouterViewStub',
  setup() {
    return () => h('div', { class: 'router-view-stub' });
  },
});

function renderLayout() {
  return render(DashboardLayout, {
    global: {
      plugins: [createPinia(), createDashboardI18n('en-US')],
      components: { RouterLink: RouterLinkStub, RouterView: RouterViewStub },
    },
  });
}

describe('DashboardLayout', () => {
  afterEach(() => {
    vi.clearAllMocks();
    config.regions = ['Espoo', 'Helsinki'];
  });

  it('shows the navigation and the model version', async () => {
    service.getVersion.mockResolvedValue({ data: { status: 'success', data: { version: '1.2.0' } } });
    renderLayout();

    expect(screen.getByText('Consumer electricity')).toHaveAttribute('href', '/electricity');
    expect(await screen.findByText('Model version 1.2.0')).toBeInTheDocument();
  });

  it('switches the region from the selector', async () => {
    service.getVersion.mockResolvedValue({ data: { status: 'error' } });
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    renderLayout();

    await fireEvent.change(screen.getByRole('combobox'), { target: { value: 'Espoo' } });

    expect(config.setCurrentRegion).toHaveBeenCalledWith('Espoo');
    warn.mockRestore();
  });

  it('hides the selector when only one region is modelled', () => {
    service.getVersion.mockResolvedValue({ data: { status: 'success', data: { version: '1.2.0' } } });
    config.regions = ['Helsinki'];
    renderLayout();

    expect(screen.queryByRole('combobox')).toBeNull();
  });
});
