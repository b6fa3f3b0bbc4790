interface TimerProps {
  label?: string;
  remainingSeconds: number;
}

export function formatSeconds(totalSeconds: number) {
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;
  return `${String(minutes).padStart(2, '0')}:${String(seconds).padStart(2, '0')}`;
}

// Ticks the display once a second and submits the quiz form at zero.
const COUNTDOWN_SCRIPT = `
(function () {
  var timer = document.getElementById('timer');
  if (!timer) return;
  var left = Number(timer.getAttribute('data-remaining')) || 0;
  var value = timer.querySelector('.timer__value');
  function render() {
    var m = Math.floor(left / 60), s = left % 60;
    value.textContent = (m < 10 ? '0' : '') + m + ':' + (s < 10 ? '0' : '') + s;
  }
  render();
  var id = setInterval(function () {
    left = Math.max(0, left - 1);
    render();
    if (left === 0) {
      clearInterval(id);
      var form = document.getElementById('quiz-form');
      if (form) form.submit();
    }
  }, 1000);
})();
`;

export default function Timer({ label = 'Осталось', remainingSeconds }: TimerProps) {
  return (
    <div id="timer" className="timer" data-remaining={remainingSeconds}>
      <span className="timer__label">{label}:</span>{' '}
      <span className="timer__value">{formatSeconds(remainingSeconds)}</span>
      <script dangerouslySetInnerHTML={{ __html: COUNTDOWN_SCRIPT }} />
    </div>
  );
}
