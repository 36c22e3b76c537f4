export { Header } from './Header.tsx';
export { PacketList } from './PacketList.tsx';
export { ReaderStatus, type ReaderStep } from './ReaderStatus.tsx';
export { DecodeApp } from './DecodeApp.tsx';
