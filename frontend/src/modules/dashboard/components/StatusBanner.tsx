import styles from '../../../styles/DashboardScreen.module.css';

type BannerLevel = 'error' | 'warning' | 'info';

const levelClass: Record<BannerLevel, string> = {
  error: styles.errorBanner,
  warning: styles.warningBanner,
  info: styles.infoBanner
};

export const StatusBanner = ({ level, message }: { level: BannerLevel; message: string }) => (
  <div className={levelClass[level]} role={level === 'info' ? 'status' : 'alert'}>
    {message}
  </div>
);
