export { Settings, readTheme, THEME_KEY, VIBRATION_KEY } from './Settings';
