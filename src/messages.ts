import type { Block, BlockType } from './types';

export type Locale = 'ar' | 'en';

export function remainingSeconds(block: Block, current: number): number {
  if (!block.isActive || current >= block.blockedUntil) {
    return 0;
  }
  return Math.max(0, Math.floor((block.blockedUntil - current) / 1000));
}

export function formatRemaining(seconds: number, locale: Locale): string {
  if (seconds <= 0) {
    return locale === 'ar' ? 'انتهت مدة الحظر' : 'block has expired';
  }
  const minutes = Math.floor(seconds / 60);
  const hours = Math.floor(minutes / 60);
  const days = Math.floor(hours / 24);

  if (locale === 'ar') {
    if (days > 0) {
      return `${days} يوم و ${hours % 24} ساعة`;
    }
    if (hours > 0) {
      return `${hours} ساعة و ${minutes % 60} دقيقة`;
    }
    if (minutes > 0) {
      return `${minutes} دقيقة`;
    }
    return `${seconds} ثانية`;
  }

  if (days > 0) {
    return `${days} day(s) and ${hours % 24} hour(s)`;
  }
  if (hours > 0) {
    return `${hours} hour(s) and ${minutes % 60} minute(s)`;
  }
  if (minutes > 0) {
    return `${minutes} minute(s)`;
  }
  return `${seconds} second(s)`;
}

function operationName(blockType: BlockType, locale: Locale): string {
  if (locale === 'ar') {
    if (blockType === 'login') {
      return 'تسجيل الدخول';
    }
    if (blockType === 'password_reset') {
      return 'إعادة تعيين كلمة المرور';
    }
    return 'تسجيل الدخول وإعادة تعيين كلمة المرور';
  }
  if (blockType === 'login') {
    return 'sign-in';
  }
  if (blockType === 'password_reset') {
    return 'password reset';
  }
  return 'sign-in and password reset';
}

export function blockMessage(block: Block, seconds: number, locale: Locale): string {
  const operation = operationName(block.blockType, locale);
  const remaining = formatRemaining(seconds, locale);
  if (locale === 'ar') {
    return (
      `تم حظر محاولات ${operation} لهذا الرقم مؤقتاً بسبب تجاوز عدد المحاولات المسموحة. ` +
      `سيتم رفع الحظر تلقائياً بعد ${remaining}. ` +
      'إذا لم تكن أنت من قام بهذه المحاولات، يرجى التواصل مع الدعم الفني فوراً.'
    );
  }
  return (
    `Too many failed ${operation} attempts for this number. ` +
    `Try again in ${remaining}. ` +
    'If these attempts were not made by you, contact support immediately.'
  );
}
