import { mountViewer } from './viewer';

mountViewer();
