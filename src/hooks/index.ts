/**
 * Hooks 导出
 */

export * from './useInputActions';
export * from './useInputMode';
export * from './useElementSize';
export * from './useHome';
export * from './useHomeNavigation';
export * from './useLayoutFocus';
export { HomeContext } from './HomeContext';
export { HomeProvider } from './HomeProvider';
