import { createContext, useContext, type ReactNode } from 'react';
import { useStore, type StoreApi } from 'zustand';
import { drawerStore, type DrawerState } from '@/store/drawerStore';

const DrawerStoreContext = createContext<StoreApi<DrawerState>>(drawerStore);

export const DrawerStoreProvider = ({ store, children }: { store: StoreApi<DrawerState>; children: ReactNode }) => (
  <DrawerStoreContext.Provider value={store}>{children}</DrawerStoreContext.Provider>
);

export const useDrawerStoreApi = () => useContext(DrawerStoreContext);

export function useDrawerStore<T>(selector: (state: DrawerState) => T): T {
  return useStore(useDrawerStoreApi(), selector);
}
