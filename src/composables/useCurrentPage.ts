import { computed, onMounted, onUnmounted } from 'vue';
import { useForecastStore } from 'stores/forecastStore';

/**
 * Composable to set the current page in the forecast store
 * Loads the page's data when the page mounts and clears the page on unmount
 * @param pageId - The id of the dashboard page being shown
 */
export function useCurrentPage(pageId: string) {
  const forecastStore = useForecastStore();

  onMounted(() => {
    forecastStore.setCurrentPage(pageId);
  });

  onUnmounted(() => {
    forecastStore.setCurrentPage(null);
  });

  return {
    currentPage: computed(() => forecastStore.currentPage),
  };
}
