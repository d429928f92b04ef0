export { SettingsService, webhookSettingKey } from './settings.service';
