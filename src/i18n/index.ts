import enUS from './en-US';
import fiFI from './fi-FI';

export default {
  'en-US': enUS,
  'fi-FI': fiFI,
};
