export * from '@/cpu/i8080';
export { isNegative, countBits } from '@/lib/bits';
